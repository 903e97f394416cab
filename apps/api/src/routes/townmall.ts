import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { LedgerEngine } from "@streakmarket/ledger";
import { ActorBody, ItemParams, UserParams, id, price } from "./schemas.js";

const stock = z.number().int().min(-1);

const CreateItemBody = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  price,
  stock: stock.optional(),
  sponsor_id: id.nullish()
});

const UpdateItemBody = z.object({
  name: z.string().min(1).optional(),
  description: z.string().nullable().optional(),
  price: price.optional(),
  stock: stock.optional()
});

export function registerTownMallRoutes(app: FastifyInstance, engine: LedgerEngine) {
  app.get("/bot/townmall", async () => {
    return { ok: true, items: await engine.listTownMallItems() };
  });

  app.post("/bot/townmall", async (req, reply) => {
    const body = CreateItemBody.parse(req.body);
    const item = await engine.addTownMallItem({
      name: body.name,
      description: body.description ?? null,
      price: body.price,
      stock: body.stock ?? -1,
      sponsor_id: body.sponsor_id ?? null
    });
    reply.code(201);
    return { ok: true, item };
  });

  app.patch("/bot/townmall/:itemId", async (req) => {
    const { itemId } = ItemParams.parse(req.params);
    const patch = UpdateItemBody.parse(req.body);
    return { ok: true, item: await engine.updateTownMallItem(itemId, patch) };
  });

  app.delete("/bot/townmall/:itemId", async (req) => {
    const { itemId } = ItemParams.parse(req.params);
    await engine.removeTownMallItem(itemId);
    return { ok: true };
  });

  app.post("/bot/townmall/:itemId/buy", async (req) => {
    const { itemId } = ItemParams.parse(req.params);
    const { user_id } = ActorBody.parse(req.body);
    return { ok: true, purchase: await engine.buyTownMallItem(user_id, itemId) };
  });

  app.get("/bot/townmall/purchases/:userId", async (req) => {
    const { userId } = UserParams.parse(req.params);
    return { ok: true, purchases: await engine.listTownMallPurchases(userId) };
  });
}
