import 'dotenv/config';
import {
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  Partials,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type User,
} from 'discord.js';
import { COMMAND_NAME, parseAction } from './commands.ts';
import { isGameMode, loadConfig } from './config.ts';
import { DiscordTransport } from './discordTransport.ts';
import { createLogger } from './logger.ts';
import { menuButtons, messages, newQuestionButton, ratingButton } from './messages.ts';
import { XmlQuestionProvider } from './questionProvider.ts';
import { RoundEngine, type Player } from './roundEngine.ts';
import { JsonScoreLedger } from './scoreStore.ts';
import { deliver } from './transport.ts';

const log = createLogger('bot');

/** ===== Config ===== */
const config = loadConfig();

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.DirectMessages,
  ],
  partials: [Partials.Channel],
});

const transport = new DiscordTransport(client);
const engine = new RoundEngine({
  provider: new XmlQuestionProvider({
    url: config.questionUrl,
    siteUrl: config.questionSiteUrl,
    timeoutMs: config.questionTimeoutMs,
  }),
  ledger: new JsonScoreLedger(config.dataDir),
  transport,
  timing: config.timing,
  hintsEnabled: config.hintsEnabled,
});

/** ===== Utilitare ===== */
function allowedChannel(channelId: string | null, inGuild: boolean): channelId is string {
  if (!channelId) return false;
  if (!config.playChannelId || !inGuild) return true;
  return channelId === config.playChannelId;
}

function playerOf(user: User, chatId: string): Player {
  return { userId: user.id, chatId, displayName: user.displayName };
}

async function serveFor(player: Player): Promise<boolean> {
  try {
    await engine.serveQuestion(player);
    return true;
  } catch (err) {
    log.warn('question.unavailable', { userId: player.userId, err });
    await deliver(transport, player.chatId, messages.questionUnavailable, { kind: 'question_unavailable' });
    return false;
  }
}

async function revealFor(userId: string, chatId: string) {
  const result = engine.revealAnswer(userId);
  if (result.status === 'revealed') {
    await deliver(transport, chatId, messages.reveal(result.answer, result.comment), {
      kind: 'reveal',
      buttons: [newQuestionButton, ratingButton],
      fallback: messages.reveal(result.answer, result.comment),
    });
    return;
  }
  const text = result.status === 'not_terminal' ? messages.revealNotTerminal : messages.noActiveRound;
  await deliver(transport, chatId, text, { kind: 'reveal' });
}

async function showRating(chatId: string) {
  try {
    const rows = await engine.leaderboard();
    await deliver(transport, chatId, messages.rating(rows), {
      kind: 'rating',
      buttons: [newQuestionButton],
      fallback: messages.rating(rows),
    });
  } catch (err) {
    log.error('rating.failed', { err });
  }
}

/** ===== /trivia ===== */
async function handleCommand(interaction: ChatInputCommandInteraction) {
  const chatId = interaction.channelId;
  if (!allowedChannel(chatId, interaction.inGuild())) {
    return interaction.reply({
      content: `Folosește comanda în canalul dedicat <#${config.playChannelId}>.`,
      flags: MessageFlags.Ephemeral,
    });
  }

  const userId = interaction.user.id;
  const sub = interaction.options.getSubcommand(false);

  if (sub === 'question') {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });
    const ok = await serveFor(playerOf(interaction.user, chatId));
    return interaction.editReply(ok ? '🎲 Întrebarea a fost trimisă.' : messages.questionUnavailable);
  }

  if (sub === 'menu') {
    await interaction.reply({ content: '🎯', flags: MessageFlags.Ephemeral });
    await deliver(transport, chatId, messages.menu(engine.modeFor(userId)), {
      kind: 'menu',
      buttons: menuButtons(),
      fallback: messages.menu(engine.modeFor(userId)),
    });
    return;
  }

  if (sub === 'mode') {
    const mode = interaction.options.getString('mod', true);
    if (!isGameMode(mode)) {
      return interaction.reply({ content: 'Mod necunoscut.', flags: MessageFlags.Ephemeral });
    }
    engine.setMode(userId, mode);
    return interaction.reply({ content: messages.modeSet(mode), flags: MessageFlags.Ephemeral });
  }

  if (sub === 'reveal') {
    await interaction.reply({ content: '👀', flags: MessageFlags.Ephemeral });
    return revealFor(userId, chatId);
  }

  if (sub === 'rating') {
    await interaction.reply({ content: '🏆', flags: MessageFlags.Ephemeral });
    return showRating(chatId);
  }

  if (sub === 'stop') {
    const stopped = engine.stopRound(userId);
    return interaction.reply({
      content: stopped ? messages.stopped : messages.nothingToStop,
      flags: MessageFlags.Ephemeral,
    });
  }

  return interaction.reply({
    content: 'Folosește **/trivia question**, **/trivia menu**, **/trivia mode**, **/trivia reveal**, **/trivia rating**, **/trivia stop**.',
    flags: MessageFlags.Ephemeral,
  });
}

/** ===== Butoane ===== */
async function handleButton(interaction: ButtonInteraction) {
  const action = parseAction(interaction.customId);
  if (!action) return;
  const chatId = interaction.channelId;
  if (!allowedChannel(chatId, interaction.inGuild())) return;

  await interaction.deferUpdate();
  switch (action.kind) {
    case 'new':
      await serveFor(playerOf(interaction.user, chatId));
      return;
    case 'rating':
      await showRating(chatId);
      return;
    case 'reveal':
      await revealFor(action.userId, chatId);
      return;
    case 'mode':
      engine.setMode(interaction.user.id, action.mode);
      await deliver(transport, chatId, messages.modeSet(action.mode), { kind: 'mode' });
      return;
  }
}

client.on(Events.InteractionCreate, async (interaction) => {
  try {
    if (interaction.isChatInputCommand() && interaction.commandName === COMMAND_NAME) {
      await handleCommand(interaction);
    } else if (interaction.isButton()) {
      await handleButton(interaction);
    }
  } catch (err) {
    log.error('interaction.failed', { id: interaction.id, err });
  }
});

/** ===== Mesaje: răspunsuri la întrebarea activă ===== */
client.on(Events.MessageCreate, async (msg) => {
  try {
    if (msg.author.bot) return;

    const round = engine.roundFor(msg.author.id);
    if (!round || round.chatId !== msg.channelId) return;

    const input = msg.content.trim();
    if (!input || input.startsWith('/')) return;

    await engine.submitAnswer(msg.author.id, input);
  } catch (err) {
    log.error('message.failed', { userId: msg.author.id, err });
  }
});

/** ===== Ready, login & shutdown ===== */
client.once(Events.ClientReady, (c) => {
  log.info('ready', { tag: c.user.tag, pid: process.pid });
});

function shutdown(signal: string) {
  log.info('shutdown', { signal });
  engine.shutdown();
  client.destroy().then(
    () => process.exit(0),
    (err: unknown) => {
      log.error('shutdown.failed', { err });
      process.exit(1);
    },
  );
}
process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

client.login(config.discordToken).catch((err: unknown) => {
  log.error('login.failed', { err });
  process.exit(1);
});
