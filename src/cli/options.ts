import { parseArgs } from 'node:util';
import { scanOrganization } from '../core/Organization.js';
import type { CrawlOptions } from '../schemas.js';
import type { CrawlConfig } from '../types.js';

export const USAGE = `Usage: site-chunker [url] [options]

Options:
  --depth <n>               link hops to follow from the seed (default 1)
  --max-pages <n>           stop after fetching n pages
  --min-length <n>          minimum chunk length in characters (default 20)
  --allow <keyword>         only follow links whose path contains keyword (repeatable)
  --block-ext <ext>         never fetch paths ending in ext (repeatable, replaces defaults)
  --include-containers      also segment div and span elements
  --subdomains              follow links to subdomains of the seed host
  --tables-in-order         emit tables where they appear instead of after the page text
  --document-type <type>    document type written on every chunk (default web_page)
  --organization <label>    organization written on every chunk
  --organization-scan <s>   take the organization from the first footer/address/p containing s
                            (not combinable with --organization)
  --timeout <ms>            request timeout (default 15000)
  --out <file>              report path (default output/extracted.txt)
  --format <text|jsonl>     report format (default text)
  -h, --help                show this message`;

export interface CliArgs {
    url?: string;
    help: boolean;
    /** Raw option values keyed by schema field, validated later by CliOptionsSchema. */
    input: Record<string, unknown>;
}

function toNumber(value: string | undefined): number | undefined {
    return value === undefined ? undefined : Number(value);
}

/**
 * Parses argv into schema-shaped input. Throws a TypeError on unknown flags.
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            'depth': { type: 'string' },
            'max-pages': { type: 'string' },
            'min-length': { type: 'string' },
            'allow': { type: 'string', multiple: true },
            'block-ext': { type: 'string', multiple: true },
            'include-containers': { type: 'boolean' },
            'subdomains': { type: 'boolean' },
            'tables-in-order': { type: 'boolean' },
            'document-type': { type: 'string' },
            'organization': { type: 'string' },
            'organization-scan': { type: 'string' },
            'timeout': { type: 'string' },
            'out': { type: 'string' },
            'format': { type: 'string' },
            'help': { type: 'boolean', short: 'h' },
        },
    });

    const input: Record<string, unknown> = {
        maxDepth: toNumber(values['depth']),
        maxPages: toNumber(values['max-pages']),
        minChunkLength: toNumber(values['min-length']),
        allowedPathKeywords: values['allow'],
        blockedExtensions: values['block-ext'],
        includeContainers: values['include-containers'],
        domainPolicy: values['subdomains'] ? 'subdomains' : undefined,
        tableOrder: values['tables-in-order'] ? 'document' : undefined,
        documentType: values['document-type'],
        organization: values['organization'],
        organizationScan: values['organization-scan'],
        timeoutMs: toNumber(values['timeout']),
        out: values['out'],
        format: values['format'],
    };
    for (const key of Object.keys(input)) {
        if (input[key] === undefined) delete input[key];
    }

    const url = positionals[0]?.trim();
    return {
        url: url || undefined,
        help: values['help'] ?? false,
        input,
    };
}

export function toCrawlConfig(options: CrawlOptions): CrawlConfig {
    const organization = options.organizationScan !== undefined
        ? scanOrganization({ needle: options.organizationScan })
        : options.organization;

    return {
        maxDepth: options.maxDepth,
        maxPages: options.maxPages,
        blockedExtensions: options.blockedExtensions,
        allowedPathKeywords: options.allowedPathKeywords,
        minChunkLength: options.minChunkLength,
        includeContainers: options.includeContainers,
        domainPolicy: options.domainPolicy,
        tableOrder: options.tableOrder,
        timeoutMs: options.timeoutMs,
        userAgent: options.userAgent,
        documentType: options.documentType,
        organization,
    };
}
