#!/usr/bin/env tsx

import { runVsphereFile } from './main';

async function readStdinText(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString('utf8');
}

async function main(): Promise<number> {
  const stdinText = await readStdinText();

  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    const { response, exitCode } = await runVsphereFile({ stdinText, signal: controller.signal });
    process.stdout.write(`${JSON.stringify(response)}\n`);
    return exitCode;
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  }
}

process.exitCode = await main();
