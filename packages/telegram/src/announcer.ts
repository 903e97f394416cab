import { Api } from "grammy";
import { pino, type BaseLogger } from "pino";
import type { AnnouncementSink, LedgerEvent } from "@streakmarket/ledger";

/** The slice of the Bot API the announcer needs. grammy's `Api` satisfies it. */
export interface ChatApi {
  sendMessage(chatId: number, text: string): Promise<unknown>;
}

export type TelegramSinkOptions = {
  api: ChatApi;
  // Group id to linked chat; null when the group has no chat yet.
  resolveChatId: (groupId: number) => Promise<number | null>;
  log?: BaseLogger;
};

export function createBotApi(token: string): Api {
  return new Api(token);
}

export function formatAnnouncement(event: LedgerEvent): string {
  switch (event.kind) {
    case "milestone_reached":
      return `🔥 ${event.user_name} hit a ${event.days}-day streak on "${event.habit_name}"!`;
    case "medal_awarded":
      return `🏅 ${event.user_name} earned a medal for 30 days of "${event.habit_name}". From now on it pays 0.5 coin per day.`;
    case "conversion_rate_improved":
      return `✨ ${event.user_name} holds 3 medals: points now convert at ${event.rate}:1.`;
    case "group_habit_perfected":
      return `🎉 Every day of ${event.month} is covered on "${event.habit_name}"! +${event.bonus} coins to each member.`;
    case "reward_purchased":
      return `🛍 ${event.buyer_name} bought "${event.reward_name}" from ${event.seller_name} for ${event.price} points.`;
    case "townmall_purchased":
      return `🏬 ${event.buyer_name} bought "${event.item_name}" at the town mall for ${event.price} coins.`;
    default: {
      const unknown: never = event;
      throw new Error(`Unhandled event: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Posts ledger events into the group's linked chat. Delivery errors propagate;
 * the engine logs them and keeps the committed write.
 */
export function createTelegramSink(opts: TelegramSinkOptions): AnnouncementSink {
  const log = opts.log ?? pino({ level: "silent" });
  return {
    async publish(event) {
      const chatId = event.group_id === null ? null : await opts.resolveChatId(event.group_id);
      if (chatId === null) {
        log.debug({ event: event.kind, group_id: event.group_id }, "no chat linked, announcement skipped");
        return;
      }
      await opts.api.sendMessage(chatId, formatAnnouncement(event));
      log.info({ event: event.kind, chat_id: chatId }, "announcement sent");
    }
  };
}
