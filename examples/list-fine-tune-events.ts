import { createClientFromEnv, OpenAIError } from '../src/index.js';

async function main(): Promise<void> {
  const fineTuneId = process.argv[2];
  if (!fineTuneId) {
    console.error('Usage: list-fine-tune-events <fine-tune-id>');
    process.exitCode = 1;
    return;
  }

  const client = createClientFromEnv(process.env, { logLevel: 'debug' });

  const events = await client.fineTunes.listEvents(fineTuneId);
  for (const event of events.data) {
    const when = event.created_at ? new Date(event.created_at * 1000).toISOString() : '-';
    console.log(`${when} [${event.level ?? 'info'}] ${event.message ?? ''}`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof OpenAIError) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
