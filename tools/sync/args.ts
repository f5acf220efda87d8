// tools/sync/args.ts

/** `--key value`, `--key=value` and bare `--flag` (read as "true"). */
export function parseArgs(argv = process.argv.slice(2)): Map<string, string> {
    const args = new Map<string, string>();
    for (let i = 0; i < argv.length; i++) {
        const a = argv[i];
        if (!a.startsWith('--')) continue;
        if (a.includes('=')) {
            const idx = a.indexOf('=');
            args.set(a.slice(2, idx), a.slice(idx + 1));
            continue;
        }
        const next = argv[i + 1];
        if (next === undefined || next.startsWith('--')) {
            args.set(a.slice(2), 'true');
        } else {
            args.set(a.slice(2), next);
            i++;
        }
    }
    return args;
}

export function numArg(args: Map<string, string>, key: string): number | undefined {
    const raw = args.get(key);
    if (raw === undefined) return undefined;
    const n = Number(raw);
    if (!Number.isFinite(n)) throw new Error(`--${key} expects a number, got "${raw}"`);
    return n;
}

export function flagArg(args: Map<string, string>, key: string): boolean {
    return args.get(key) === 'true';
}
