import { Hono } from "hono";
import { z } from "zod";
import { AppError, formatError } from "./lib/errors";
import { log } from "./lib/logger";
import { formatIssuePath } from "./lib/validation";
import type { UserRepository } from "./repositories/user-repository";
import { createScriptsRoutes } from "./routes/scripts";
import { createUsersRoutes } from "./routes/users";
import type { ScriptService } from "./services/script-service";

export interface AppDeps {
  users: UserRepository;
  scripts: ScriptService;
  /** Hides unexpected error messages from clients when true. */
  production: boolean;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;

    if (status >= 400) {
      log.api.warn(`${method} ${path}`, { status, durationMs: duration });
    } else {
      log.api.info(`${method} ${path}`, { status, durationMs: duration });
    }
  });

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof AppError) {
      const level = err.statusCode >= 500 ? "error" : "warn";
      log.api[level](err.message, {
        code: err.code,
        status: err.statusCode,
        details: err.details,
      });
      return c.json(err.toJSON(), err.statusCode);
    }

    if (err instanceof z.ZodError) {
      const issues = err.issues.map((i) => ({
        path: formatIssuePath(i.path),
        message: i.message,
      }));
      log.api.warn("Validation error", {
        issues: issues.map((i) => `${i.path}: ${i.message}`),
      });
      return c.json(
        {
          error: {
            code: "VALIDATION_ERROR",
            message: "Invalid request",
            details: issues,
          },
        },
        400
      );
    }

    // Unknown errors
    const formatted = formatError(err);
    log.api.error("Unhandled error", {
      error: formatted.message,
      stack: formatted.stack,
    });

    return c.json(
      {
        error: {
          code: "INTERNAL_ERROR",
          message: deps.production ? "Internal server error" : formatted.message,
        },
      },
      500
    );
  });

  app.notFound((c) =>
    c.json({ error: { code: "NOT_FOUND", message: "Route not found" } }, 404)
  );

  // Health check
  app.get("/", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.route("/users", createUsersRoutes(deps.users));
  app.route("/users", createScriptsRoutes(deps.scripts));

  return app;
}
