// src/transport.ts
import { createLogger } from './logger.ts';
import type { ChatButton, ChatTransport } from './types.ts';

const log = createLogger('transport');

export interface DeliverOptions {
  buttons?: ChatButton[];
  /** text simplu trimis dacă mesajul bogat eșuează */
  fallback?: string;
  /** numele notificării, pentru log */
  kind?: string;
}

/**
 * Trimite un mesaj fără să arunce niciodată. Eșecurile sunt logate;
 * starea rundei nu depinde de rezultat.
 */
export async function deliver(
  transport: ChatTransport,
  chatId: string,
  text: string,
  opts: DeliverOptions = {},
): Promise<boolean> {
  try {
    await transport.sendMessage(chatId, text, opts.buttons);
    return true;
  } catch (err) {
    log.warn('delivery.failed', { chatId, kind: opts.kind ?? null, err });
  }
  if (opts.fallback === undefined) return false;

  try {
    await transport.sendMessage(chatId, opts.fallback);
    return true;
  } catch (err) {
    log.error('delivery.fallback_failed', { chatId, kind: opts.kind ?? null, err });
    return false;
  }
}

export async function deliverPhoto(
  transport: ChatTransport,
  chatId: string,
  url: string,
  caption?: string,
): Promise<boolean> {
  try {
    await transport.sendPhoto(chatId, url, caption);
    return true;
  } catch (err) {
    log.warn('delivery.photo_failed', { chatId, url, err });
    return false;
  }
}
