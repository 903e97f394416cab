import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { LedgerEngine } from "@streakmarket/ledger";
import { GroupParams, UserParams, id } from "./schemas.js";

const UpsertUserBody = z.object({
  telegram_user_id: id,
  username: z.string().nullish(),
  first_name: z.string().nullish()
});

const CreateGroupBody = z.object({ name: z.string().min(1) });
const JoinGroupBody = z.object({ user_id: id });
const LinkChatBody = z.object({ chat_id: z.number().int().nullable() });

export function registerUserRoutes(app: FastifyInstance, engine: LedgerEngine) {
  app.post("/bot/upsert-user", async (req) => {
    const body = UpsertUserBody.parse(req.body);
    const user = await engine.registerUser({
      id: body.telegram_user_id,
      username: body.username ?? null,
      first_name: body.first_name ?? null
    });
    return { ok: true, user };
  });

  app.get("/bot/me/:userId", async (req) => {
    const { userId } = UserParams.parse(req.params);
    const profile = await engine.getProfile(userId);
    return { ok: true, ...profile };
  });

  app.post("/bot/groups", async (req, reply) => {
    const body = CreateGroupBody.parse(req.body);
    const group = await engine.createGroup(body.name);
    reply.code(201);
    return { ok: true, group };
  });

  app.get("/bot/groups/:groupId", async (req) => {
    const { groupId } = GroupParams.parse(req.params);
    const group = await engine.getGroup(groupId);
    const members = await engine.listGroupMembers(groupId);
    return { ok: true, group, members };
  });

  app.post("/bot/groups/:groupId/join", async (req) => {
    const { groupId } = GroupParams.parse(req.params);
    const body = JoinGroupBody.parse(req.body);
    const group = await engine.joinGroup(body.user_id, groupId);
    return { ok: true, group };
  });

  // The bot calls this when it is added to (or removed from) the group's chat.
  app.post("/bot/groups/:groupId/chat", async (req) => {
    const { groupId } = GroupParams.parse(req.params);
    const body = LinkChatBody.parse(req.body);
    const group = await engine.linkGroupChat(groupId, body.chat_id);
    return { ok: true, group };
  });
}
