/**
 * Router factory. Request validation failures become 400 error bodies.
 */

import { OpenAPIHono } from "@hono/zod-openapi";
import { describeIssues, type ErrorBody } from "./errors.js";

export function createRouter(): OpenAPIHono {
	return new OpenAPIHono({
		defaultHook: (result, c) => {
			if (!result.success) {
				const body: ErrorBody = {
					error: "validation_error",
					message: "Invalid request",
					details: describeIssues(result.error.issues),
					hint: "Check the request parameters and try again.",
				};
				return c.json(body, 400);
			}
		},
	});
}
