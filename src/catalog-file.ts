import fs from 'fs';
import { z } from 'zod';
import { CatalogSource, MemberKind } from './catalog';
import { CatalogError, describeError } from './errors';
import { getLoggableFilename } from './logging';

const memberSchema = z.object({
    kind: z.enum(['function', 'field']).default('function'),
    /** Type names used by parameters and return value, as the generator spells them */
    types: z.array(z.string()).default([]),
    pureVirtual: z.boolean().default(false),
});

const typeSchema = z.object({
    bases: z.array(z.string()).default([]),
    members: z.record(memberSchema).default({}),
});

const catalogSchema = z.object({
    types: z.record(typeSchema),
});

/** On-disk shape of a JSON catalog, before defaults are applied */
export type CatalogDescription = z.input<typeof catalogSchema>;
type ParsedCatalog = z.output<typeof catalogSchema>;

/**
 * Catalog backend over a binding generator metadata dump:
 *
 *     { "types": { "QWidget": { "bases": ["QObject", "QPaintDevice"],
 *                               "members": { "show": { "kind": "function", "types": [] } } } } }
 *
 * Descendants are derived by inverting `bases`.
 */
export function createCatalogSource(description: CatalogDescription): CatalogSource {
    return parseCatalog(description, 'catalog');
}

function parseCatalog(raw: unknown, origin: string): CatalogSource {
    const result = catalogSchema.safeParse(raw);
    if(!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new CatalogError(`invalid ${origin}: ${issues}`);
    }
    return fromParsed(result.data);
}

function fromParsed(catalog: ParsedCatalog): CatalogSource {
    const types = new Map(Object.entries(catalog.types));
    const children = new Map<string, string[]>();
    for(const [name, type] of types) {
        for(const base of type.bases) {
            const list = children.get(base) ?? [];
            list.push(name);
            children.set(base, list);
        }
    }

    function member(type: string, name: string) {
        return types.get(type)?.members[name];
    }

    return {
        async listTypes() {
            return [...types.keys()];
        },
        async isType(name) {
            return types.has(name);
        },
        async directAncestors(type) {
            return types.get(type)?.bases ?? [];
        },
        async directDescendants(type) {
            return children.get(type) ?? [];
        },
        async members(type) {
            return Object.keys(types.get(type)?.members ?? {});
        },
        async signatureTypeNames(type, name) {
            return member(type, name)?.types ?? [];
        },
        async isPureVirtual(type, name) {
            return member(type, name)?.pureVirtual ?? false;
        },
        async memberKind(type, name): Promise<MemberKind> {
            return member(type, name)?.kind ?? 'function';
        },
    };
}

export function readCatalogFile(path: string): CatalogSource {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(path, 'utf8'));
    } catch(e: unknown) {
        throw new CatalogError(`cannot load catalog ${getLoggableFilename(path)}: ${describeError(e)}`, undefined, { cause: e });
    }
    return parseCatalog(raw, `catalog ${getLoggableFilename(path)}`);
}
