import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { LedgerEngine } from "@streakmarket/ledger";
import { id, pointType } from "./schemas.js";

const ConvertBody = z.object({
  user_id: id,
  from: pointType,
  to: pointType,
  amount: z.number().int().positive()
});

export function registerPointRoutes(app: FastifyInstance, engine: LedgerEngine) {
  app.post("/bot/points/convert", async (req) => {
    const body = ConvertBody.parse(req.body);
    const conversion = await engine.convertPoints(body.user_id, body.from, body.to, body.amount);
    const user = await engine.getUser(body.user_id);
    return { ok: true, conversion, points: user.points };
  });
}
