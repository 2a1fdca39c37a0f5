// src/discordTransport.ts
import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder, type Client } from 'discord.js';
import { DeliveryError } from './errors.ts';
import type { ChatButton, ChatTransport } from './types.ts';

const MAX_BUTTONS_PER_ROW = 5;

export function buildButtonRows(buttons: ChatButton[]): ActionRowBuilder<ButtonBuilder>[] {
  const rows: ActionRowBuilder<ButtonBuilder>[] = [];
  for (let i = 0; i < buttons.length; i += MAX_BUTTONS_PER_ROW) {
    const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
      buttons
        .slice(i, i + MAX_BUTTONS_PER_ROW)
        .map((b) => new ButtonBuilder().setCustomId(b.action).setLabel(b.label).setStyle(ButtonStyle.Secondary)),
    );
    rows.push(row);
  }
  return rows;
}

/** ChatTransport peste discord.js; chatId = id-ul canalului (text, thread sau DM). */
export class DiscordTransport implements ChatTransport {
  constructor(private readonly client: Client) {}

  private async channel(chatId: string) {
    const ch = await this.client.channels.fetch(chatId).catch((err: unknown) => {
      throw new DeliveryError('Canal inaccesibil', { chatId }, err);
    });
    if (!ch || !ch.isSendable()) throw new DeliveryError('Canalul nu acceptă mesaje', { chatId });
    return ch;
  }

  async sendMessage(chatId: string, text: string, buttons: ChatButton[] = []): Promise<void> {
    const ch = await this.channel(chatId);
    await ch.send({ content: text, components: buildButtonRows(buttons) });
  }

  async sendPhoto(chatId: string, url: string, caption?: string): Promise<void> {
    const ch = await this.channel(chatId);
    const embed = new EmbedBuilder().setImage(url);
    if (caption) embed.setDescription(caption);
    await ch.send({ embeds: [embed] });
  }
}
