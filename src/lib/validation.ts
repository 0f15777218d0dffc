import type { Context } from "hono";

type ValidationResult<T> =
	| { success: true; data: T }
	| {
			success: false;
			error: {
				issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>;
			};
	  };

export function formatIssuePath(path: ReadonlyArray<PropertyKey>): string {
	return path.map((segment) => String(segment)).join(".");
}

export function handleZodError<T>(
	result: ValidationResult<T>,
	c: Context,
): Response | undefined {
	if (!result.success) {
		const issues = result.error.issues.map((issue) => ({
			path: formatIssuePath(issue.path),
			message: issue.message,
		}));

		return c.json(
			{
				error: {
					code: "VALIDATION_ERROR",
					message: issues[0]?.message || "Invalid request",
					details: issues,
				},
			},
			400,
		);
	}
}
