import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { monthOf, todayLocal } from "@streakmarket/shared";
import type { LedgerEngine } from "@streakmarket/ledger";
import { GroupParams, isoMonth } from "./schemas.js";

const MonthQuery = z.object({ month: isoMonth.optional() });

export function registerReportRoutes(app: FastifyInstance, engine: LedgerEngine) {
  app.get("/bot/groups/:groupId/leaderboard", async (req) => {
    const { groupId } = GroupParams.parse(req.params);
    const month = MonthQuery.parse(req.query).month ?? monthOf(todayLocal());
    return { ok: true, month, leaderboard: await engine.monthlyLeaderboard(groupId, month) };
  });
}
