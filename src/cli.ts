#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { z } from 'zod';
import { type CliArgs, parseCliArgs, toCrawlConfig, USAGE } from './cli/options.js';
import { writeReport } from './output/TextReport.js';
import { CliOptionsSchema } from './schemas.js';
import { SiteChunker } from './SiteChunker.js';

async function promptForUrl(): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        return (await rl.question('Enter the URL of the site to crawl: ')).trim();
    } finally {
        rl.close();
    }
}

async function main(argv: string[]): Promise<number> {
    let args: CliArgs;
    try {
        args = parseCliArgs(argv);
    } catch (e) {
        console.error(e instanceof Error ? e.message : String(e));
        console.error(USAGE);
        return 1;
    }

    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    const url = args.url ?? await promptForUrl();
    const parsed = CliOptionsSchema.safeParse({ ...args.input, url });
    if (!parsed.success) {
        console.error(z.prettifyError(parsed.error));
        return 1;
    }

    const options = parsed.data;
    console.log('\nStarting crawl...\n');
    const result = await SiteChunker.crawl(options.url, toCrawlConfig(options));

    console.log(`\nExtracted ${result.chunks.length} content chunks`);
    const file = await writeReport(result.chunks, options.out, options.format);
    console.log(`Saved extracted content to: ${file}`);
    return 0;
}

main(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
);
