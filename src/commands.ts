// src/commands.ts
import { SlashCommandBuilder } from 'discord.js';
import { GAME_MODES, MODES, isGameMode } from './config.ts';
import type { GameMode } from './types.ts';

export const COMMAND_NAME = 'trivia';
const ACTION_PREFIX = 'trivia';

/** ===== Acțiuni pe butoane (customId) ===== */
export type TriviaAction =
  | { kind: 'reveal'; userId: string }
  | { kind: 'new' }
  | { kind: 'rating' }
  | { kind: 'mode'; mode: GameMode };

export function encodeAction(action: TriviaAction): string {
  switch (action.kind) {
    case 'reveal':
      return `${ACTION_PREFIX}:reveal:${action.userId}`;
    case 'mode':
      return `${ACTION_PREFIX}:mode:${action.mode}`;
    default:
      return `${ACTION_PREFIX}:${action.kind}`;
  }
}

export function parseAction(customId: string): TriviaAction | null {
  const [prefix, verb, arg] = customId.split(':');
  if (prefix !== ACTION_PREFIX) return null;
  if (verb === 'new') return { kind: 'new' };
  if (verb === 'rating') return { kind: 'rating' };
  if (verb === 'reveal' && arg) return { kind: 'reveal', userId: arg };
  if (verb === 'mode' && arg && isGameMode(arg)) return { kind: 'mode', mode: arg };
  return null;
}

/** ===== Comanda slash /trivia ===== */
export function buildTriviaCommand() {
  const modeChoices = GAME_MODES.map((m) => ({ name: MODES[m].label, value: m }));

  return new SlashCommandBuilder()
    .setName(COMMAND_NAME)
    .setDescription('Întrebări de trivia contra cronometru')
    .addSubcommand((sc) => sc.setName('question').setDescription('Primește o întrebare nouă'))
    .addSubcommand((sc) => sc.setName('menu').setDescription('Meniul jocului: întrebare, clasament, moduri'))
    .addSubcommand((sc) =>
      sc
        .setName('mode')
        .setDescription('Alege modul de joc')
        .addStringOption((o) =>
          o.setName('mod').setDescription('Modul de joc').setRequired(true).addChoices(...modeChoices),
        ),
    )
    .addSubcommand((sc) => sc.setName('reveal').setDescription('Arată răspunsul rundei încheiate'))
    .addSubcommand((sc) => sc.setName('rating').setDescription('Clasamentul jucătorilor'))
    .addSubcommand((sc) => sc.setName('stop').setDescription('Oprește runda curentă'))
    .toJSON();
}
