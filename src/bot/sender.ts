// ============================================================================
// OUTBOUND MESSAGES
// ============================================================================

import type { Api } from "grammy";

import { ChatId } from "../types/index.js";

/**
 * Sends a bot-initiated message (HTML) to a chat
 */
export interface ChatSender {
  send(chatId: ChatId, text: string): Promise<void>;
}

export function createTelegramSender(api: Api): ChatSender {
  return {
    async send(chatId, text) {
      await api.sendMessage(chatId, text, { parse_mode: "HTML" });
    },
  };
}
