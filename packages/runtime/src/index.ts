/**
 * @secsearch/runtime
 *
 * Process-level wiring shared by the API server and the CLI.
 */

export { createServices, type ServiceOverrides, type Services } from "./services.js";
