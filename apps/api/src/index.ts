import { createTelegramSink, createBotApi } from "@streakmarket/telegram";
import { getEnv } from "./config.js";
import { PgLedgerStore, createPool, migrate } from "./db/pgStore.js";
import { buildServer } from "./server.js";

const env = getEnv();
const pool = createPool(env.DATABASE_URL);
await migrate(pool);

const store = new PgLedgerStore(pool);
const token = env.TELEGRAM_BOT_TOKEN;

const app = buildServer({
  store,
  logLevel: env.LOG_LEVEL,
  sink: token
    ? (log) =>
        createTelegramSink({
          api: createBotApi(token),
          resolveChatId: async (groupId) => (await store.transaction((tx) => tx.getGroup(groupId)))?.chat_id ?? null,
          log
        })
    : undefined
});

if (!token) app.log.warn("TELEGRAM_BOT_TOKEN not set, announcements are disabled");

await app.listen({ port: env.PORT, host: "0.0.0.0" });
