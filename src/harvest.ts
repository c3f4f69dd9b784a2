import fs from 'fs';
import Path from 'path';
import AdmZip from 'adm-zip';
import { Project as TsProject, ScriptKind, SourceFile } from 'ts-morph';
import { globby } from 'zx';
import { collectIdentifiers, createSourceFileUnit } from './code-unit';
import { describeError, HarvestError } from './errors';
import { getLoggableFilename, Logger, silentLogger } from './logging';

export const DEFAULT_INCLUDE = ['**/*.{js,mjs,cjs,jsx,ts,mts,cts,tsx}', '**/*.zip'];
export const DEFAULT_IGNORE = ['**/node_modules/**', '**/*.d.ts'];

/** Extension on disk -> how to parse it, and the extension its in-memory copy gets */
const scriptKinds: Record<string, [ScriptKind, string]> = {
    '.js': [ScriptKind.JS, '.js'],
    '.mjs': [ScriptKind.JS, '.js'],
    '.cjs': [ScriptKind.JS, '.js'],
    '.jsx': [ScriptKind.JSX, '.jsx'],
    '.ts': [ScriptKind.TS, '.ts'],
    '.mts': [ScriptKind.TS, '.ts'],
    '.cts': [ScriptKind.TS, '.ts'],
    '.tsx': [ScriptKind.TSX, '.tsx'],
};

export interface HarvestOptions {
    include?: string[];
    ignore?: string[];
    log?: Logger;
    /** Called once per code unit that was scanned successfully */
    onUnit?(label: string, identifierCount: number): void;
}

export interface SkippedUnit {
    unit: string;
    reason: string;
}

export interface HarvestResult {
    identifiers: Set<string>;
    unitCount: number;
    skipped: SkippedUnit[];
}

interface PendingUnit {
    label: string;
    sourceFile: SourceFile;
}

/**
 * Accumulates code units into one in-memory ts-morph project, then scans them
 * together.  Parsing is deferred so the syntax check builds a single program.
 */
export class Harvester {
    private readonly tsProject = new TsProject({
        useInMemoryFileSystem: true,
        compilerOptions: { allowJs: true, noLib: true },
    });
    private readonly pending: PendingUnit[] = [];
    private readonly skipped: SkippedUnit[] = [];
    private readonly log: Logger;

    constructor(private readonly options: HarvestOptions = {}) {
        this.log = options.log ?? silentLogger;
    }

    static isSourcePath(path: string) {
        return !path.endsWith('.d.ts') && Path.extname(path) in scriptKinds;
    }

    addSource(label: string, text: string, extension = '.js') {
        const [scriptKind, virtualExtension] = scriptKinds[extension] ?? scriptKinds['.js'];
        const virtualPath = `/units/${this.pending.length}${virtualExtension}`;
        try {
            const sourceFile = this.tsProject.createSourceFile(virtualPath, text, { overwrite: true, scriptKind });
            this.pending.push({ label, sourceFile });
        } catch(e: unknown) {
            this.skip(new HarvestError(`cannot parse: ${describeError(e)}`, label, { cause: e }));
        }
    }

    addFile(path: string, label = getLoggableFilename(path)) {
        let text: string;
        try {
            text = fs.readFileSync(path, 'utf8');
        } catch(e: unknown) {
            this.skip(new HarvestError(`cannot read: ${describeError(e)}`, label, { cause: e }));
            return;
        }
        this.addSource(label, text, Path.extname(path));
    }

    /** Every source entry of the archive is a unit; archives inside archives are opened too. */
    addArchive(label: string, archive: string | Buffer) {
        let zip: AdmZip;
        try {
            zip = new AdmZip(archive);
        } catch(e: unknown) {
            this.skip(new HarvestError(`cannot open archive: ${describeError(e)}`, label, { cause: e }));
            return;
        }
        for(const entry of zip.getEntries()) {
            if(entry.isDirectory) continue;
            const entryLabel = `${label}!/${entry.entryName}`;
            const isArchive = entry.entryName.endsWith('.zip');
            if(!isArchive && !Harvester.isSourcePath(entry.entryName)) continue;
            // bad checksum, encryption or an unsupported compression method
            let data: Buffer;
            try {
                data = entry.getData();
            } catch(e: unknown) {
                this.skip(new HarvestError(`cannot read archive entry: ${describeError(e)}`, entryLabel, { cause: e }));
                continue;
            }
            if(isArchive) this.addArchive(entryLabel, data);
            else this.addSource(entryLabel, data.toString('utf8'), Path.extname(entry.entryName));
        }
    }

    /** Scan everything added so far.  Units with syntax errors are skipped, never fatal. */
    finish(): HarvestResult {
        const identifiers = new Set<string>();
        let unitCount = 0;
        const program = this.tsProject.getProgram();
        for(const { label, sourceFile } of this.pending) {
            const [firstError] = program.getSyntacticDiagnostics(sourceFile);
            if(firstError) {
                const message = firstError.getMessageText();
                const text = typeof message === 'string' ? message : message.getMessageText();
                this.skip(new HarvestError(`syntax error on line ${firstError.getLineNumber() ?? '?'}: ${text}`, label));
                continue;
            }
            const before = identifiers.size;
            collectIdentifiers(createSourceFileUnit(sourceFile, label), identifiers);
            unitCount++;
            this.log.debug(`- UNIT ${label} (+${identifiers.size - before} identifiers)`);
            this.options.onUnit?.(label, identifiers.size);
        }
        return { identifiers, unitCount, skipped: [...this.skipped] };
    }

    private skip(err: HarvestError) {
        this.log.warn(`WARNING skipping ${err.unit}: ${err.message}`);
        this.skipped.push({ unit: err.unit, reason: err.message });
    }
}

/** Nearest enclosing package name for each directory, looked up once per directory. */
function createPackageLocator(root: string, log: Logger) {
    const cache = new Map<string, string | null>();
    function packageOf(dir: string): string | null {
        const cached = cache.get(dir);
        if(cached !== undefined) return cached;
        let name: string | null = null;
        const manifest = Path.join(dir, 'package.json');
        if(fs.existsSync(manifest)) {
            try {
                const parsed: unknown = JSON.parse(fs.readFileSync(manifest, 'utf8'));
                if(parsed && typeof parsed === 'object' && 'name' in parsed && typeof parsed.name === 'string') {
                    name = parsed.name;
                }
            } catch(e: unknown) {
                log.warn(`WARNING unreadable package marker ${getLoggableFilename(manifest)}: ${describeError(e)}`);
            }
        }
        if(name === null && dir !== root && Path.dirname(dir) !== dir) {
            name = packageOf(Path.dirname(dir));
        }
        cache.set(dir, name);
        return name;
    }
    return { packageOf };
}

/**
 * Find every loadable unit under an application root and merge the names they use.
 * It is a wide net: false positives only cost savings, misses cost correctness.
 */
export async function harvestIdentifiers(root: string, options: HarvestOptions = {}): Promise<HarvestResult> {
    const log = options.log ?? silentLogger;
    const rootAbs = Path.resolve(root);
    const files = (await globby(options.include ?? DEFAULT_INCLUDE, {
        cwd: rootAbs,
        absolute: true,
        onlyFiles: true,
        ignore: options.ignore ?? DEFAULT_IGNORE,
        // unreadable directories drop out of the walk
        suppressErrors: true,
    })).sort();
    log.info(`Harvesting identifiers from ${files.length} files under ${getLoggableFilename(rootAbs) || '.'}`);

    const harvester = new Harvester(options);
    const packages = createPackageLocator(rootAbs, log);
    for(const file of files) {
        const relative = Path.relative(rootAbs, file).split(Path.sep).join('/');
        const pkg = packages.packageOf(Path.dirname(file));
        const label = pkg ? `[${pkg}] ${relative}` : relative;
        if(file.endsWith('.zip')) harvester.addArchive(label, file);
        else harvester.addFile(file, label);
    }
    return harvester.finish();
}

/** Harvest a single in-memory unit. */
export function harvestSource(label: string, text: string, extension = '.js') {
    const harvester = new Harvester();
    harvester.addSource(label, text, extension);
    return harvester.finish();
}
