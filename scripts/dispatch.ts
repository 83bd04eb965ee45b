#!/usr/bin/env npx tsx
/**
 * Local dispatch CLI.
 *
 * Sends a request to the local dispatcher without any client code.
 *
 * Usage:
 *   npm run dispatch "What is 2+2?"
 *   npm run dispatch -- --require math "What is 2+2?"
 *   npm run dispatch -- --session conv-1 --stream "Tell me more"
 */

const BASE_URL = process.env.BASE_URL || 'http://localhost:3000';

interface Options {
  require: string[];
  prefer: string[];
  session?: string;
  stream: boolean;
  message: string;
}

function parseArgs(args: string[]): Options {
  const options: Options = {
    require: [],
    prefer: [],
    stream: false,
    message: '',
  };

  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--require' || arg === '-r') {
      options.require.push(...(args[++i] ?? '').split(',').filter(Boolean));
    } else if (arg === '--prefer' || arg === '-p') {
      options.prefer.push(...(args[++i] ?? '').split(',').filter(Boolean));
    } else if (arg === '--session' || arg === '-s') {
      options.session = args[++i] || undefined;
    } else if (arg === '--stream') {
      options.stream = true;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }

  options.message = positional.join(' ');

  return options;
}

function printHelp(): void {
  console.log(`
Local Dispatch CLI

Usage:
  npm run dispatch "your request here"
  npm run dispatch -- --require math,arithmetic "2+2"
  npm run dispatch -- --session conv-1 "follow-up question"

Options:
  --require, -r     Required capability tags (comma-separated)
  --prefer, -p      Preferred capability tags (comma-separated)
  --session, -s     Session id for multi-turn conversations
  --stream          Use the NDJSON streaming endpoint
  --help, -h        Show this help message
`);
}

async function sendRequest(options: Options): Promise<void> {
  if (!options.message) {
    console.error('Error: No request provided');
    console.error('Usage: npm run dispatch "your request"');
    process.exit(1);
  }

  const body = {
    payload: options.message,
    ...(options.require.length > 0 ? { requiredCapabilities: options.require } : {}),
    ...(options.prefer.length > 0 ? { preferredCapabilities: options.prefer } : {}),
    ...(options.session ? { sessionId: options.session } : {}),
  };
  const url = `${BASE_URL}/dispatch${options.stream ? '/stream' : ''}`;

  console.log('----------------------------------------');
  console.log(`Request: ${options.message}`);
  if (options.require.length > 0) console.log(`Requires: ${options.require.join(', ')}`);
  if (options.session) console.log(`Session: ${options.session}`);
  console.log('----------------------------------------');
  console.log(`Sending to: ${url}`);
  console.log('');

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    });

    console.log(`Response Status: ${response.status}`);
    if (options.stream && response.body) {
      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        process.stdout.write(decoder.decode(value, { stream: true }));
      }
    } else {
      console.log(`Response Body: ${JSON.stringify(await response.json(), null, 2)}`);
    }

  } catch (error) {
    if (error instanceof Error && error.message.includes('ECONNREFUSED')) {
      console.error('Error: Could not connect to server');
      console.error('Make sure the server is running: npm run dev');
    } else {
      console.error('Error:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

// Parse arguments (skip node and script path)
const args = process.argv.slice(2);
const options = parseArgs(args);

sendRequest(options).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
