import Fastify, { type FastifyError } from "fastify";
import cors from "@fastify/cors";
import type { BaseLogger } from "pino";
import { ZodError } from "zod";
import {
  type AnnouncementSink,
  type LedgerErrorKind,
  type LedgerStore,
  LedgerEngine,
  isLedgerError
} from "@streakmarket/ledger";
import { registerHabitRoutes } from "./routes/habits.js";
import { registerPointRoutes } from "./routes/points.js";
import { registerReportRoutes } from "./routes/reports.js";
import { registerRewardRoutes } from "./routes/rewards.js";
import { registerTownMallRoutes } from "./routes/townmall.js";
import { registerUserRoutes } from "./routes/users.js";

export const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  NotFound: 404,
  InsufficientFunds: 409,
  InvalidAllocation: 400,
  InvalidConversion: 400,
  InvalidInput: 400,
  NotAllowed: 403,
  OutOfStock: 409
};

export type ServerOptions = {
  store: LedgerStore;
  // Built with the server's logger so announcement logs share its bindings.
  sink?: (log: BaseLogger) => AnnouncementSink;
  logLevel?: string;
};

export function buildServer(opts: ServerOptions) {
  const app = Fastify({
    logger: {
      level: opts.logLevel ?? "info"
    }
  });

  void app.register(cors, { origin: true });

  const engine = new LedgerEngine({
    store: opts.store,
    sink: opts.sink?.(app.log.child({ module: "telegram" })),
    log: app.log.child({ module: "ledger" })
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (isLedgerError(err)) {
      void reply.code(STATUS_BY_KIND[err.kind]).send({ ok: false, error: err.kind, message: err.message });
      return;
    }
    if (err instanceof ZodError) {
      const message = err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
      void reply.code(400).send({ ok: false, error: "InvalidInput", message });
      return;
    }
    const status = err.statusCode ?? 500;
    if (status >= 500) req.log.error({ err }, "request failed");
    void reply.code(status).send({ ok: false, error: status >= 500 ? "Internal" : err.code, message: err.message });
  });

  app.get("/health", async () => {
    return { ok: true, service: "streakmarket-api", ts: new Date().toISOString() };
  });

  registerUserRoutes(app, engine);
  registerHabitRoutes(app, engine);
  registerPointRoutes(app, engine);
  registerRewardRoutes(app, engine);
  registerTownMallRoutes(app, engine);
  registerReportRoutes(app, engine);

  return app;
}
