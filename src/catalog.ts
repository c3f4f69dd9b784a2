import { uniq } from 'lodash-es';
import { CatalogError, describeError } from './errors';
import { Logger, silentLogger } from './logging';
import { AsyncCache } from './util';

/** Field vs. callable member: the only distinction the typesystem patchers need. */
export type MemberKind = 'function' | 'field';

/**
 * Raw backend describing the binding layer's API surface: generated docs, the
 * binding generator's metadata, a JSON dump.  Answers are uncanonicalized and
 * may be expensive to produce.
 */
export interface CatalogSource {
    listTypes(): Promise<string[]>;
    isType(name: string): Promise<boolean>;
    /** Names of direct base types, exactly as the backend spells them */
    directAncestors(type: string): Promise<string[]>;
    directDescendants(type: string): Promise<string[]>;
    members(type: string): Promise<string[]>;
    /** Type names mentioned in the member's parameters and return value */
    signatureTypeNames(type: string, member: string): Promise<string[]>;
    isPureVirtual(type: string, member: string): Promise<boolean>;
    memberKind(type: string, member: string): Promise<MemberKind>;
}

/**
 * What the closure engine and rejection emitter ask of the binding layer.
 * Every answer is in canonical type names; a name that is not a type gets an
 * empty/negative answer rather than an error.
 */
export interface TypeCatalog {
    allTypes(): Promise<readonly string[]>;
    /** `type` itself first, then every transitive ancestor nearest-first */
    ancestors(type: string): Promise<readonly string[]>;
    /** `type` itself first, then every transitive descendant nearest-first */
    descendants(type: string): Promise<readonly string[]>;
    /** Members declared directly on `type` */
    members(type: string): Promise<readonly string[]>;
    /** Approximation of the types that can flow through the member; only ever used to widen */
    relatedTypes(type: string, member: string): Promise<ReadonlySet<string>>;
    isPureVirtual(type: string, member: string): Promise<boolean>;
    memberKind(type: string, member: string): Promise<MemberKind>;
}

export interface TypeCatalogOptions {
    /** Template placeholders that never name a real type */
    placeholders?: string[];
    /** Typedef suffix -> generic container, so `FooList` resolves to `Foo` and the container */
    listSuffixes?: Record<string, string>;
    log?: Logger;
}

export const DEFAULT_PLACEHOLDERS = ['T'];
export const DEFAULT_LIST_SUFFIXES: Record<string, string> = { List: 'QList' };

const genericRe = /^([A-Za-z_]\w*)\s*<(.*)>$/s;

/** Split template arguments at top-level commas: `A, B<C, D>` -> [`A`, `B<C, D>`] */
function splitTemplateArguments(args: string) {
    const parts: string[] = [];
    let depth = 0;
    let current = '';
    for(const ch of args) {
        if(ch === '<') depth++;
        else if(ch === '>') depth--;
        if(ch === ',' && depth === 0) {
            parts.push(current);
            current = '';
        } else {
            current += ch;
        }
    }
    parts.push(current);
    return parts.map(p => p.trim()).filter(p => p.length > 0);
}

/** Strip qualifiers a signature may carry: `const QString &` -> `QString`, `QPalette::ColorRole` -> `QPalette` */
export function cleanTypeName(raw: string) {
    let name = raw.trim().replace(/^(const|volatile)\s+/, '').replace(/\s+const$/, '').replace(/[\s*&]+$/, '');
    if(!genericRe.test(name)) name = name.split('::')[0];
    return name.trim();
}

/**
 * Memoizing adapter from a raw backend to the canonical catalog contract.
 * Each query key is answered by the backend at most once per adapter instance;
 * there is no state shared between instances.
 */
export function createTypeCatalog(source: CatalogSource, options: TypeCatalogOptions = {}): TypeCatalog {
    const log = options.log ?? silentLogger;
    const placeholders = new Set(options.placeholders ?? DEFAULT_PLACEHOLDERS);
    const listSuffixes = Object.entries(options.listSuffixes ?? DEFAULT_LIST_SUFFIXES);

    const caches = {
        allTypes: new AsyncCache<'*', string[]>(),
        isType: new AsyncCache<string, boolean>(),
        directAncestors: new AsyncCache<string, string[]>(),
        directDescendants: new AsyncCache<string, string[]>(),
        ancestors: new AsyncCache<string, string[]>(),
        descendants: new AsyncCache<string, string[]>(),
        members: new AsyncCache<string, string[]>(),
        canonical: new AsyncCache<string, string[]>(),
        related: new AsyncCache<string, Set<string>>(),
        pureVirtual: new AsyncCache<string, boolean>(),
        memberKind: new AsyncCache<string, MemberKind>(),
    };

    /** Run a backend query, turning any failure into a CatalogError naming the query. */
    async function query<T>(description: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch(e: unknown) {
            if(e instanceof CatalogError) throw e;
            throw new CatalogError(`catalog query ${description} failed: ${describeError(e)}`, description, { cause: e });
        }
    }

    function isType(name: string) {
        return caches.isType.get(name, () => query(`isType(${name})`, () => source.isType(name)));
    }

    /** Resolve a raw spelling to zero or more catalog types. */
    function canonicalNames(raw: string): Promise<string[]> {
        return caches.canonical.get(raw, async () => {
            const name = cleanTypeName(raw);
            if(name === '' || placeholders.has(name)) return [];
            const generic = genericRe.exec(name);
            if(generic) {
                const resolved: string[] = [];
                for(const part of [generic[1], ...splitTemplateArguments(generic[2])]) {
                    resolved.push(...await canonicalNames(part));
                }
                return uniq(resolved);
            }
            if(await isType(name)) return [name];
            for(const [suffix, container] of listSuffixes) {
                if(name.length > suffix.length && name.endsWith(suffix)) {
                    const element = await canonicalNames(name.slice(0, -suffix.length));
                    const containers = await isType(container) ? [container] : [];
                    const resolved = uniq([...element, ...containers]);
                    if(resolved.length) return resolved;
                }
            }
            log.debug(`dropping unresolvable type name ${JSON.stringify(raw)}`);
            return [];
        });
    }

    /** Breadth-first transitive walk over one direction of the inheritance graph. */
    async function walk(type: string, step: (t: string) => Promise<string[]>) {
        if(!await isType(type)) return [];
        const order = [type];
        const seen = new Set(order);
        for(let i = 0; i < order.length; i++) {
            for(const raw of await step(order[i])) {
                for(const next of await canonicalNames(raw)) {
                    if(seen.has(next)) continue;
                    seen.add(next);
                    order.push(next);
                }
            }
        }
        return order;
    }

    function directAncestors(type: string) {
        return caches.directAncestors.get(type, () => query(`directAncestors(${type})`, () => source.directAncestors(type)));
    }
    function directDescendants(type: string) {
        return caches.directDescendants.get(type, () => query(`directDescendants(${type})`, () => source.directDescendants(type)));
    }

    function memberKey(type: string, member: string) {
        return `${type}.${member}`;
    }

    return {
        allTypes() {
            return caches.allTypes.get('*', async () => {
                const types = await query('listTypes()', () => source.listTypes());
                return uniq(types).sort();
            });
        },
        ancestors(type) {
            return caches.ancestors.get(type, () => walk(type, directAncestors));
        },
        descendants(type) {
            return caches.descendants.get(type, () => walk(type, directDescendants));
        },
        members(type) {
            return caches.members.get(type, async () => {
                if(!await isType(type)) return [];
                return uniq(await query(`members(${type})`, () => source.members(type)));
            });
        },
        relatedTypes(type, member) {
            return caches.related.get(memberKey(type, member), async () => {
                if(!await isType(type)) return new Set<string>();
                const raw = await query(`signatureTypeNames(${type}, ${member})`, () => source.signatureTypeNames(type, member));
                const related = new Set<string>();
                for(const name of raw) {
                    for(const canonical of await canonicalNames(name)) related.add(canonical);
                }
                return related;
            });
        },
        isPureVirtual(type, member) {
            return caches.pureVirtual.get(memberKey(type, member), async () => {
                if(!await isType(type)) return false;
                return query(`isPureVirtual(${type}, ${member})`, () => source.isPureVirtual(type, member));
            });
        },
        memberKind(type, member) {
            return caches.memberKind.get(memberKey(type, member), () =>
                query(`memberKind(${type}, ${member})`, () => source.memberKind(type, member)));
        },
    };
}
