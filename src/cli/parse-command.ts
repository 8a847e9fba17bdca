export type CliCommand =
    | { name: 'ingest'; paths: string[] }
    | { name: 'health' }
    | { name: 'search'; query: string; limit?: number }
    | { name: 'similar'; query: string; limit?: number }
    | { name: 'help' };

export const USAGE = [
    'Usage: knowledge-ingest <command>',
    '',
    '  ingest <path...>                 ingest one or more text files',
    '  search <query> [--limit <n>]     full-text search over chunks',
    '  similar <query> [--limit <n>]    similarity search over chunk embeddings',
    '  health                           report storage and embedding status',
].join('\n');

export class UsageError extends Error { }

export function parseCommand(argv: readonly string[]): CliCommand {
    const [name, ...rest] = argv;

    switch (name) {
        case 'ingest':
            if (rest.length === 0) {
                throw new UsageError('ingest needs at least one path');
            }
            return { name, paths: [...rest] };
        case 'health':
            return { name };
        case 'search':
        case 'similar': {
            const { words, limit } = splitLimit(rest);
            if (words.length === 0) {
                throw new UsageError(`${name} needs a query`);
            }
            return { name, query: words.join(' '), limit };
        }
        case undefined:
        case 'help':
        case '--help':
        case '-h':
            return { name: 'help' };
        default:
            throw new UsageError(`Unknown command: ${name}`);
    }
}

function splitLimit(args: readonly string[]): { words: string[]; limit?: number } {
    const words: string[] = [];
    let limit: number | undefined;

    for (let i = 0; i < args.length; i++) {
        if (args[i] !== '--limit') {
            words.push(args[i]);
            continue;
        }
        const value = Number(args[i + 1]);
        if (!Number.isInteger(value) || value < 1) {
            throw new UsageError('--limit needs a positive integer');
        }
        limit = value;
        i++;
    }
    return { words, limit };
}
