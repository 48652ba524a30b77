import { readFileSync } from "node:fs";

export type FixtureName = "sample-10k.html" | "sample-10q.html";

/**
 * Read a fixture from packages/mocks/fixtures. `{{company}}` is replaced
 * with the given name.
 */
export function loadFixture(name: FixtureName, company = "Example Corp"): string {
	const html = readFileSync(new URL(`../fixtures/${name}`, import.meta.url), "utf8");
	return html.replaceAll("{{company}}", company);
}
