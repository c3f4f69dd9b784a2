import fs from 'fs';
import Path from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { DEFAULT_LIST_SUFFIXES, DEFAULT_PLACEHOLDERS } from './catalog';
import { ConfigError, describeError } from './errors';
import { DEFAULT_IGNORE, DEFAULT_INCLUDE } from './harvest';

export interface Config {
    /** Root of the host application: sources, bundled output, package directories, zip archives */
    appRoot: string;
    /** JSON catalog of the binding layer's types and members */
    catalog: string;
    /** Globs under `appRoot` that are code units */
    include?: string[];
    /** Globs under `appRoot` to leave out.  The binding layer's own wrappers belong here. */
    ignore?: string[];
    /** Extra types that must never be rejected wholesale */
    keepTypes?: string[];
    /** Extra members to keep, per type; `*` key for every type, `*` entry for every member */
    keepMembers?: Record<string, string[]>;
    /** Use only `keepTypes`/`keepMembers`, dropping the built-in override tables */
    replaceDefaultOverrides?: boolean;
    /** Template placeholders that never name a type */
    placeholders?: string[];
    /** Typedef suffix -> generic container, e.g. `{ List: 'QList' }` */
    listSuffixes?: Record<string, string>;
    /** Write rejections here; stdout when omitted */
    output?: string;
    format?: 'typesystem' | 'json';
    /** `package` attribute of the emitted typesystem */
    packageName?: string;
    logLevel?: 'debug' | 'info' | 'warn' | 'error';
    /** Live progress view in the terminal */
    progress?: boolean;
}

const configSchema = z.object({
    appRoot: z.string().min(1),
    catalog: z.string().min(1),
    include: z.array(z.string()).default(DEFAULT_INCLUDE),
    ignore: z.array(z.string()).default(DEFAULT_IGNORE),
    keepTypes: z.array(z.string()).default([]),
    keepMembers: z.record(z.array(z.string())).default({}),
    replaceDefaultOverrides: z.boolean().default(false),
    placeholders: z.array(z.string()).default(DEFAULT_PLACEHOLDERS),
    listSuffixes: z.record(z.string()).default(DEFAULT_LIST_SUFFIXES),
    output: z.string().optional(),
    format: z.enum(['typesystem', 'json']).default('typesystem'),
    packageName: z.string().default('bindings'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    progress: z.boolean().default(false),
}).strict();

export type ResolvedConfig = z.output<typeof configSchema>;

export interface LoadedConfig extends ResolvedConfig {
    basedir: string;
    appRootAbs: string;
    catalogAbs: string;
    outputAbs: string | undefined;
}

/** Validate a config object and resolve its paths against `basedir`. */
export function resolveConfig(config: unknown, basedir: string): LoadedConfig {
    const result = configSchema.safeParse(config);
    if(!result.success) {
        const [issue] = result.error.issues;
        const field = issue.path.join('.');
        throw new ConfigError(`invalid config${field ? ` at ${field}` : ''}: ${issue.message}`, field || undefined);
    }
    const resolved = result.data;
    return {
        ...resolved,
        basedir,
        appRootAbs: Path.resolve(basedir, resolved.appRoot),
        catalogAbs: Path.resolve(basedir, resolved.catalog),
        outputAbs: resolved.output === undefined ? undefined : Path.resolve(basedir, resolved.output),
    };
}

/** Load a config module (`export const config` or a default export) or a JSON file. */
export async function readConfig(configPath: string, cwd: string = process.cwd()): Promise<LoadedConfig> {
    const configPathAbs = Path.resolve(cwd, configPath);
    if(!fs.existsSync(configPathAbs)) {
        throw new ConfigError(`config file not found: ${configPathAbs}`);
    }
    let config: unknown;
    try {
        if(configPathAbs.endsWith('.json')) {
            config = JSON.parse(fs.readFileSync(configPathAbs, 'utf8'));
        } else {
            const configModule: unknown = await import(pathToFileURL(configPathAbs).href);
            config = pickExport(configModule);
        }
    } catch(e: unknown) {
        throw new ConfigError(`cannot load config ${configPathAbs}: ${describeError(e)}`);
    }
    return resolveConfig(config, Path.dirname(configPathAbs));
}

function pickExport(configModule: unknown): unknown {
    if(configModule && typeof configModule === 'object') {
        if('config' in configModule && configModule.config !== undefined) return configModule.config;
        if('default' in configModule && configModule.default !== undefined) return configModule.default;
    }
    return configModule;
}
