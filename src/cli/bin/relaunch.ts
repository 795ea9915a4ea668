#!/usr/bin/env node
// src/cli/bin/relaunch.ts
// CLI bootstrap (executes the parser).
import { CommanderError } from 'commander';

import { exitCodeForError } from '../cli-utils';
import { makeCli } from '..';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    // Commander has already printed its own usage errors.
    if (!(e instanceof CommanderError)) {
      console.error(e instanceof Error ? e.message : String(e));
    }
    process.exitCode = exitCodeForError(e);
  });
