import { describe, expect, it } from 'vitest';
import { CatalogSource, createTypeCatalog } from '../src/catalog';
import { createCatalogSource } from '../src/catalog-file';
import { computeClosure, UsefulReason } from '../src/closure';
import { CatalogError } from '../src/errors';
import { EMPTY_OVERRIDES, mergeOverrides, OverridePolicy } from '../src/policy';
import { catalogOf, scenarioA } from './helpers';

const noOverrides = new OverridePolicy(EMPTY_OVERRIDES);

describe('computeClosure', () => {
    it('reaches harvested types, their ancestors and the types their kept members use', async () => {
        const closure = await computeClosure({
            catalog: catalogOf(scenarioA),
            policy: noOverrides,
            identifiers: new Set(['B', 'foo']),
        });
        expect(closure.useful).toEqual(new Set(['A', 'B', 'C']));
        expect(closure.keptMembers.get('B')).toEqual(new Set(['foo']));
        expect(closure.forcedMembers.get('B')).toEqual(new Set());
        expect(closure.processed).toEqual(['B', 'A', 'C']);
    });

    it('reports each type as it is added and processed', async () => {
        const added: [string, UsefulReason][] = [];
        const processed: [string, number][] = [];
        await computeClosure({
            catalog: catalogOf(scenarioA),
            policy: noOverrides,
            identifiers: new Set(['B', 'foo']),
            observer: {
                typeAdded(type, reason) { added.push([type, reason]); },
                typeProcessed(type, pending) { processed.push([type, pending]); },
            },
        });
        expect(added).toEqual([
            ['B', UsefulReason.Harvested],
            ['A', UsefulReason.Ancestor],
            ['C', UsefulReason.Related],
        ]);
        expect(processed).toEqual([['B', 2], ['A', 1], ['C', 0]]);
    });

    it('leaves the useful set closed under ancestors', async () => {
        const catalog = catalogOf({
            types: {
                Base: {},
                Mid: { bases: ['Base'] },
                Leaf: { bases: ['Mid'], members: { make: { types: ['Other *'] } } },
                OtherBase: {},
                Other: { bases: ['OtherBase'] },
            },
        });
        const closure = await computeClosure({ catalog, policy: noOverrides, identifiers: new Set(['Leaf', 'make']) });
        expect(closure.useful).toEqual(new Set(['Base', 'Mid', 'Leaf', 'OtherBase', 'Other']));
        for(const type of closure.useful) {
            for(const ancestor of await catalog.ancestors(type)) {
                expect(closure.useful.has(ancestor)).toBe(true);
            }
        }
    });

    it('does not widen through members nobody uses', async () => {
        const closure = await computeClosure({
            catalog: catalogOf(scenarioA),
            policy: noOverrides,
            identifiers: new Set(['B']),
        });
        expect(closure.useful).toEqual(new Set(['A', 'B']));
    });

    it('seeds always-kept types even when nothing names them', async () => {
        const policy = new OverridePolicy(mergeOverrides(EMPTY_OVERRIDES, { keepTypes: ['C'] }));
        const added: [string, UsefulReason][] = [];
        const closure = await computeClosure({
            catalog: catalogOf(scenarioA),
            policy,
            identifiers: new Set(),
            observer: { typeAdded(type, reason) { added.push([type, reason]); } },
        });
        expect(closure.useful).toEqual(new Set(['A', 'C']));
        expect(added).toEqual([['C', UsefulReason.Policy], ['A', UsefulReason.Ancestor]]);
    });

    it('widens through policy-forced members', async () => {
        const policy = new OverridePolicy(mergeOverrides(EMPTY_OVERRIDES, { keepMembers: { B: ['bar'] } }));
        const catalog = catalogOf({
            types: {
                ...scenarioA.types,
                B: { bases: ['A'], members: { foo: { types: ['C'] }, bar: { types: ['D'] } } },
            },
        });
        const closure = await computeClosure({ catalog, policy, identifiers: new Set(['B']) });
        expect(closure.useful).toEqual(new Set(['A', 'B', 'D']));
        expect(closure.forcedMembers.get('B')).toEqual(new Set(['bar']));
    });

    it('processes each type once through cyclic member references', async () => {
        const closure = await computeClosure({
            catalog: catalogOf({
                types: {
                    X: { members: { toY: { types: ['Y'] } } },
                    Y: { members: { toX: { types: ['X &'] } } },
                },
            }),
            policy: noOverrides,
            identifiers: new Set(['X', 'toY', 'toX']),
        });
        expect(closure.useful).toEqual(new Set(['X', 'Y']));
        expect(closure.processed).toEqual(['X', 'Y']);
    });

    it('ignores identifiers that are not types', async () => {
        const closure = await computeClosure({
            catalog: catalogOf(scenarioA),
            policy: noOverrides,
            identifiers: new Set(['console', 'log', 'D']),
        });
        expect(closure.useful).toEqual(new Set(['D']));
    });

    it('gives the same answer every time', async () => {
        const run = () => computeClosure({
            catalog: catalogOf(scenarioA),
            policy: noOverrides,
            identifiers: new Set(['B', 'foo']),
        });
        const first = await run();
        const second = await run();
        expect(second.useful).toEqual(first.useful);
        expect(second.keptMembers).toEqual(first.keptMembers);
        expect(second.processed).toEqual(first.processed);
    });

    it('only grows when more identifiers are harvested', async () => {
        const catalog = catalogOf(scenarioA);
        const smaller = await computeClosure({ catalog, policy: noOverrides, identifiers: new Set(['B']) });
        const larger = await computeClosure({ catalog, policy: noOverrides, identifiers: new Set(['B', 'foo', 'D']) });
        for(const type of smaller.useful) expect(larger.useful.has(type)).toBe(true);
        expect(larger.useful).toEqual(new Set(['A', 'B', 'C', 'D']));
    });

    it('processes no more types than the catalog holds', async () => {
        const catalog = catalogOf(scenarioA);
        const closure = await computeClosure({ catalog, policy: noOverrides, identifiers: new Set(['A', 'B', 'C', 'D', 'foo', 'bar']) });
        expect(closure.processed).toHaveLength((await catalog.allTypes()).length);
        expect(new Set(closure.processed).size).toBe(closure.processed.length);
    });

    it('propagates catalog failures', async () => {
        const backend = createCatalogSource(scenarioA);
        const broken: CatalogSource = {
            ...backend,
            async signatureTypeNames() {
                throw new Error('backend went away');
            },
        };
        const run = computeClosure({
            catalog: createTypeCatalog(broken),
            policy: noOverrides,
            identifiers: new Set(['B', 'foo']),
        });
        await expect(run).rejects.toBeInstanceOf(CatalogError);
        await expect(run).rejects.toThrow('catalog query signatureTypeNames(B, foo) failed: backend went away');
    });
});
