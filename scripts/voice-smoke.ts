#!/usr/bin/env node

import { createReadStream, createWriteStream, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import process from 'node:process';
import { PcmStreamCaptureDevice, PcmStreamPlaybackDevice } from '../src/audio/pcmStreamDevices.js';
import { loadConfig } from '../src/config.js';
import { createVoiceClient } from '../src/index.js';
import { LAUNCH_MODES } from '../src/types.js';
import type { LaunchMode } from '../src/types.js';
import { loadEnvironment } from '../src/utils/env.js';

type ParsedArgs = {
  help: boolean;
  config?: string;
  baseUrl?: string;
  input?: string;
  output?: string;
  launchMode?: string;
  contentId?: number;
  timeoutSeconds: number;
  realtime: boolean;
};

const USAGE = `
Live voice smoke test

Streams a PCM16 (or WAV) file as the microphone, writes assistant audio to a file
and prints every event until the session goes quiet.

Usage:
  npx tsx scripts/voice-smoke.ts --input <file> [options]

Options:
  --input <path>             PCM16LE or WAV file used as microphone input (required)
  --output <path>            Where assistant audio is written (default: assistant.pcm)
  --base-url <url>           Voice API base URL (default: VOICE_API_BASE_URL)
  --config <path>            Config file (default: config.json)
  --launch-mode <mode>       ${LAUNCH_MODES.join('/')}
  --content-id <n>           Content the session is about
  --timeout <seconds>        Give up after this long (default: 60)
  --no-realtime              Feed the file as fast as it reads
  --help                     Show this message
`;

function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, timeoutSeconds: 60, realtime: true };

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw.startsWith('--')) {
      continue;
    }
    const eq = raw.indexOf('=');
    const flag = eq >= 0 ? raw.slice(0, eq) : raw;
    const inlineValue = eq >= 0 ? raw.slice(eq + 1).trim() : undefined;
    const name = flag.replace(/^--/, '');

    const getValue = () => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[index + 1];
      if (next !== undefined && !next.startsWith('--')) {
        index += 1;
        return next;
      }
      throw new Error(`${flag} needs a value`);
    };

    switch (name) {
      case 'help':
        result.help = true;
        break;
      case 'config':
        result.config = getValue();
        break;
      case 'base-url':
        result.baseUrl = getValue();
        break;
      case 'input':
        result.input = getValue();
        break;
      case 'output':
        result.output = getValue();
        break;
      case 'launch-mode':
        result.launchMode = getValue();
        break;
      case 'content-id': {
        const value = Number(getValue());
        if (!Number.isInteger(value)) {
          throw new Error('content-id must be an integer');
        }
        result.contentId = value;
        break;
      }
      case 'timeout': {
        const value = Number(getValue());
        if (!Number.isFinite(value) || value <= 0) {
          throw new Error('timeout must be a positive number of seconds');
        }
        result.timeoutSeconds = value;
        break;
      }
      case 'no-realtime':
        result.realtime = false;
        break;
      default:
        console.warn(`Unknown option: ${flag}`);
        break;
    }
  }

  return result;
}

function ensureLaunchMode(value?: string): LaunchMode | undefined {
  if (value === undefined) return undefined;
  const mode = LAUNCH_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new Error(`launch-mode must be one of ${LAUNCH_MODES.join(', ')}, got ${value}`);
  }
  return mode;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }
  if (!args.input) {
    throw new Error('--input is required');
  }
  const inputPath = resolve(process.cwd(), args.input);
  if (!existsSync(inputPath)) {
    throw new Error(`input file not found: ${inputPath}`);
  }
  const outputPath = resolve(process.cwd(), args.output ?? 'assistant.pcm');

  loadEnvironment();
  const config = await loadConfig(args.config ? resolve(process.cwd(), args.config) : undefined);
  const playback = new PcmStreamPlaybackDevice(() => createWriteStream(outputPath), 'smoke-output');
  const client = createVoiceClient(config, {
    baseUrl: args.baseUrl,
    devices: {
      capture: new PcmStreamCaptureDevice(() => createReadStream(inputPath), {
        id: 'smoke-input',
        frameMs: config.audio.frameMs,
        realtime: args.realtime,
        trailingSilenceMs: 3_000,
      }),
      playback,
    },
  });

  client.connectionState.subscribe((state) => console.log(`[connection] ${JSON.stringify(state)}`));
  client.turnState.subscribe((state, previous) => console.log(`[turn] ${previous} -> ${state}`));
  client.onNotice((notice) => console.log(`[notice] ${notice.kind}: ${notice.message}`));
  client.onEvent((event) => {
    if (event.type === 'assistant.audio.chunk') return;
    const detail = event.text ?? event.message ?? '';
    console.log(`[event] ${event.type}${event.turnId ? ` (${event.turnId})` : ''}${detail ? `: ${detail}` : ''}`);
  });

  let completedTurns = 0;
  const finished = new Promise<void>((resolveFinished) => {
    client.onEvent((event) => {
      if (event.type === 'turn.completed' && !event.isIntro) {
        completedTurns += 1;
        resolveFinished();
      }
    });
    client.connectionState.subscribe((state) => {
      if (state.status === 'failed' || state.status === 'closed') resolveFinished();
    });
  });
  const timeout = new Promise<void>((resolveTimeout) => {
    setTimeout(resolveTimeout, args.timeoutSeconds * 1000).unref();
  });

  const interrupt = () => {
    console.log('\nInterrupted, closing session');
    void client.cancel().finally(() => process.exit(130));
  };
  process.once('SIGINT', interrupt);

  await client.connect({ launchMode: ensureLaunchMode(args.launchMode), contentId: args.contentId });
  if (client.phase === 'active') {
    await Promise.race([finished, timeout]);
  }
  await client.cancel();
  process.off('SIGINT', interrupt);

  console.log('\n=== summary ===');
  console.log(`completed turns: ${completedTurns}`);
  console.log(`assistant text: ${client.assistantText.get() || '(none)'}`);
  console.log(`assistant audio: ${playback.bytesWritten} bytes -> ${outputPath}`);
  if (client.lastError) {
    console.log(`error: ${client.lastError.kind}: ${client.lastError.message}`);
    process.exitCode = 1;
  }
  console.log('\n--- timeline ---');
  for (const line of client.timeline()) {
    console.log(line);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
