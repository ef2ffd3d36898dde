#!/usr/bin/env node
import 'dotenv/config';
import { logger } from '@klinevault/utils';
import { buildProgram } from './program';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.fatal({ err: error instanceof Error ? error.stack : String(error) }, 'klinevault crashed');
    process.exitCode = 1;
  });
