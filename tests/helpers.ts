import fs from 'fs';
import os from 'os';
import Path from 'path';
import { CatalogSource, createTypeCatalog } from '../src/catalog';
import { CatalogDescription, createCatalogSource } from '../src/catalog-file';

export function catalogOf(description: CatalogDescription) {
    return createTypeCatalog(createCatalogSource(description));
}

/** Wrap a backend so tests can see how often each query actually reached it. */
export function countingSource(source: CatalogSource) {
    const counts: Record<keyof CatalogSource, number> = {
        listTypes: 0,
        isType: 0,
        directAncestors: 0,
        directDescendants: 0,
        members: 0,
        signatureTypeNames: 0,
        isPureVirtual: 0,
        memberKind: 0,
    };
    const wrapped: CatalogSource = {
        listTypes() { counts.listTypes++; return source.listTypes(); },
        isType(name) { counts.isType++; return source.isType(name); },
        directAncestors(type) { counts.directAncestors++; return source.directAncestors(type); },
        directDescendants(type) { counts.directDescendants++; return source.directDescendants(type); },
        members(type) { counts.members++; return source.members(type); },
        signatureTypeNames(type, member) { counts.signatureTypeNames++; return source.signatureTypeNames(type, member); },
        isPureVirtual(type, member) { counts.isPureVirtual++; return source.isPureVirtual(type, member); },
        memberKind(type, member) { counts.memberKind++; return source.memberKind(type, member); },
    };
    return { source: wrapped, counts };
}

export function makeTempDir() {
    return fs.mkdtempSync(Path.join(os.tmpdir(), 'binding-trim-'));
}

export function writeFiles(root: string, files: Record<string, string | Buffer>) {
    for(const [relative, content] of Object.entries(files)) {
        const path = Path.join(root, relative);
        fs.mkdirSync(Path.dirname(path), { recursive: true });
        fs.writeFileSync(path, content);
    }
}

/** The four-type catalog most closure and rejection tests start from */
export const scenarioA: CatalogDescription = {
    types: {
        A: {},
        B: {
            bases: ['A'],
            members: {
                foo: { types: ['C'] },
                bar: {},
            },
        },
        C: { bases: ['A'] },
        D: {},
    },
};
