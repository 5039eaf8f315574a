#!/usr/bin/env node
// CLI entry point for md-digest
// Environment must be loaded before the config module is first imported

process.env.DOTENV_CONFIG_QUIET = 'true';

async function main(): Promise<void> {
  const { loadEnv } = await import('./config/env.js');
  loadEnv();

  const { runCli } = await import('./cli/index.js');
  await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
