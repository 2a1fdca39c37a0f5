import 'dotenv/config';
import { REST, Routes } from 'discord.js';
import { z } from 'zod';
import { buildTriviaCommand } from './commands.ts';
import { loadConfig } from './config.ts';

const config = loadConfig();
const rest = new REST({ version: '10' }).setToken(config.discordToken);

const AppSchema = z.object({ id: z.string() });
const CommandListSchema = z.array(z.object({ name: z.string() }));

async function getAppId(): Promise<string> {
  const app = AppSchema.safeParse(await rest.get(Routes.oauth2CurrentApplication()));
  if (!app.success) throw new Error('Nu am putut obține Application ID din token.');
  return app.data.id;
}

async function deploy(appId: string) {
  const commands = [buildTriviaCommand()];

  if (config.guildId) {
    console.log('🔁 Înregistrez comenzi GUILD…');
    await rest.put(Routes.applicationGuildCommands(appId, config.guildId), { body: commands });
    console.log('✅ GUILD commands up to date.');
  } else {
    console.log('🌍 Înregistrez comenzi GLOBAL (poate dura câteva minute)…');
    await rest.put(Routes.applicationCommands(appId), { body: commands });
    console.log('✅ GLOBAL commands up to date.');
  }
}

async function list(appId: string) {
  const global = CommandListSchema.parse(await rest.get(Routes.applicationCommands(appId)));
  console.log(`🌍 GLOBAL (${global.length}):`, global.map((c) => c.name).join(', ') || '—');

  if (config.guildId) {
    const guild = CommandListSchema.parse(await rest.get(Routes.applicationGuildCommands(appId, config.guildId)));
    console.log(`🏠 GUILD ${config.guildId} (${guild.length}):`, guild.map((c) => c.name).join(', ') || '—');
  } else {
    console.log('🏠 GUILD: (nu ai GUILD_ID în .env)');
  }
}

async function clear(appId: string) {
  if (config.guildId) {
    console.log(`🗑 Șterg comenzile GUILD ${config.guildId}…`);
    await rest.put(Routes.applicationGuildCommands(appId, config.guildId), { body: [] });
    console.log('✅ GUILD commands șterse.');
    return;
  }
  console.log('🗑 Șterg toate comenzile **GLOBAL**…');
  await rest.put(Routes.applicationCommands(appId), { body: [] });
  console.log('✅ GLOBAL commands șterse.');
}

async function main() {
  const action = process.argv[2] ?? 'deploy';
  const appId = await getAppId();

  if (action === 'deploy') return deploy(appId);
  if (action === 'list') return list(appId);
  if (action === 'clear') return clear(appId);
  throw new Error(`Acțiune necunoscută "${action}" (deploy | list | clear).`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
