#!/usr/bin/env node
import { runCli } from '../app/cli/run';
import { logger } from '../shared/backend/logger';

runCli(process.argv)
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        logger.fatal({ err: error }, 'Unexpected failure');
        process.exitCode = 1;
    });
