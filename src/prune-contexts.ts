#!/usr/bin/env node
import 'dotenv/config';
import { createStdinReader, Prompter } from './prompt';
import { runPrune } from './run';

const input = createStdinReader();

async function main() {
  const prompter = new Prompter(input.read);
  await runPrune(process.argv.slice(2), { prompter });
  input.close();
}

main().catch((err) => {
  console.error('uh oh :(');
  console.error(err instanceof Error && err.stack ? err.stack : err);
  input.close();
  process.exit(1);
});
