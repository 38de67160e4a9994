import dotenv from 'dotenv';
import { runCli } from './run';

async function main(): Promise<void> {
  dotenv.config();
  process.exitCode = await runCli(process.argv.slice(2));
}

void main();
