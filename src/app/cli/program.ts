import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';
import { z } from 'zod';

export type CliIo = {
    writeOut: (str: string) => void;
    writeErr: (str: string) => void;
};

export type CliOptions = {
    input: string;
    output: string;
    patterns?: string[];
    encoding?: string;
    alphanumeric?: boolean;
    debug?: boolean;
};

const packageManifestSchema = z.object({ version: z.string() });

// src/app/cli and dist/app/cli both sit three levels below the package root.
function readPackageVersion(): string {
    const manifest = readFileSync(join(__dirname, '..', '..', '..', 'package.json'), 'utf8');
    return packageManifestSchema.parse(JSON.parse(manifest)).version;
}

export function createProgram(io: CliIo): Command {
    return new Command()
        .name('serial-masker')
        .description('Masks device serial numbers in files.')
        .version(readPackageVersion())
        .requiredOption('-i, --input <path>', 'the input file to process')
        .requiredOption('-o, --output <path>', 'the output file to write to')
        .option(
            '-p, --patterns <pattern...>',
            'regular expressions matching serial numbers, repeatable or comma-separated (defaults to common shapes)',
        )
        .option('-e, --encoding <name>', 'force the file encoding instead of detecting it')
        .option('--alphanumeric', 'replace every character with A-Z0-9 instead of preserving character classes')
        .option('-d, --debug', 'enable debug logging')
        .helpOption('-h, --help', 'display usage')
        .configureOutput({ writeOut: io.writeOut, writeErr: io.writeErr })
        .exitOverride();
}
