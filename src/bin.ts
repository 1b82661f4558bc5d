#!/usr/bin/env node
import { main } from './program.js';

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
