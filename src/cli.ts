#!/usr/bin/env tsx
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { registerRunCommand, registerValidateCommand } from './commands/index.ts';

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')));

const program = new Command();

program
  .name('stepwright')
  .description('A declarative workflow step execution engine')
  .version(pkg.version);

registerValidateCommand(program);
registerRunCommand(program);

await program.parseAsync(process.argv);
