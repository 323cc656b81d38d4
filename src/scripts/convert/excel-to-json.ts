#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import {
  EXIT_FAILURE,
  runConvertCommand,
} from '@/modules/conversion/interface/cli/convert-command';

const logger = new Logger('sheet2json');

runConvertCommand(process.argv.slice(2), logger)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error(`Fatal error: ${error instanceof Error ? error.stack : String(error)}`);
    process.exitCode = EXIT_FAILURE;
  });
