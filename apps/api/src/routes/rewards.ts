import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { LedgerEngine } from "@streakmarket/ledger";
import { ActorQuery, GroupParams, RewardParams, UserParams, allocation, id, price, rewardPointType } from "./schemas.js";

const CreateRewardBody = z.object({ user_id: id, name: z.string().min(1), price, point_type: rewardPointType });
const UpdateRewardBody = z.object({ user_id: id, name: z.string().min(1).optional(), price: price.optional() });
const BuyBody = z.object({ user_id: id, allocation: allocation.optional() });

export function registerRewardRoutes(app: FastifyInstance, engine: LedgerEngine) {
  app.get("/bot/groups/:groupId/rewards", async (req) => {
    const { groupId } = GroupParams.parse(req.params);
    return { ok: true, rewards: await engine.listGroupRewards(groupId) };
  });

  app.post("/bot/rewards", async (req, reply) => {
    const body = CreateRewardBody.parse(req.body);
    const reward = await engine.createReward(body.user_id, {
      name: body.name,
      price: body.price,
      point_type: body.point_type
    });
    reply.code(201);
    return { ok: true, reward };
  });

  app.patch("/bot/rewards/:rewardId", async (req) => {
    const { rewardId } = RewardParams.parse(req.params);
    const { user_id, ...patch } = UpdateRewardBody.parse(req.body);
    return { ok: true, reward: await engine.updateReward(user_id, rewardId, patch) };
  });

  app.delete("/bot/rewards/:rewardId", async (req) => {
    const { rewardId } = RewardParams.parse(req.params);
    const { user_id } = ActorQuery.parse(req.query);
    await engine.deleteReward(user_id, rewardId);
    return { ok: true };
  });

  app.post("/bot/rewards/:rewardId/buy", async (req) => {
    const { rewardId } = RewardParams.parse(req.params);
    const body = BuyBody.parse(req.body);
    const result = await engine.buyReward(body.user_id, rewardId, body.allocation);
    return { ok: true, ...result };
  });

  app.get("/bot/transactions/:userId", async (req) => {
    const { userId } = UserParams.parse(req.params);
    return { ok: true, transactions: await engine.listTransactions(userId) };
  });
}
