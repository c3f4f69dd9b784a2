import { TypeCatalog } from './catalog';

/** Key in `keepMembers` that applies to every type, and entry meaning "every member" */
export const WILDCARD = '*';

/**
 * Static exception tables.  This is the one place where crashes caused by the
 * unsound usage scan get patched, so keep entries specific and covered by tests.
 */
export interface OverrideTables {
    /** Never rejected wholesale, even without usage evidence */
    keepTypes: readonly string[];
    /**
     * Members kept regardless of usage.  `*` as a key applies to every type;
     * `*` inside a type's list keeps all of that type's members.
     */
    keepMembers: Readonly<Record<string, readonly string[]>>;
}

export const DEFAULT_OVERRIDES: OverrideTables = {
    // used internally by the runtime substrate
    keepTypes: ['QApplication', 'QWidget', 'QFlag', 'QFlags', 'QBuffer'],
    keepMembers: {
        [WILDCARD]: [
            'metaObject', // much breakage ensues if this is missing
            'devType',    // rejecting this segfaults on linux
            'metric',     // fonts don't display correctly without it
        ],
        QBitArray: ['setBit'],
        QByteArray: ['insert'],
        // pointer casting in the wrappers breaks when any accessor is removed
        QPixmap: [WILDCARD],
        QImage: [WILDCARD],
        QPicture: [WILDCARD],
        QX11Info: [WILDCARD],
    },
};

export const EMPTY_OVERRIDES: OverrideTables = { keepTypes: [], keepMembers: {} };

/** Union of two tables; per-type member lists are merged, not replaced. */
export function mergeOverrides(base: OverrideTables, extra: Partial<OverrideTables>): OverrideTables {
    const keepMembers: Record<string, string[]> = {};
    for(const table of [base.keepMembers, extra.keepMembers ?? {}]) {
        for(const [type, members] of Object.entries(table)) {
            keepMembers[type] = [...new Set([...(keepMembers[type] ?? []), ...members])];
        }
    }
    return {
        keepTypes: [...new Set([...base.keepTypes, ...(extra.keepTypes ?? [])])],
        keepMembers,
    };
}

export class OverridePolicy {
    private readonly keepTypes: ReadonlySet<string>;
    private readonly globalMembers: ReadonlySet<string>;
    private readonly typeMembers: ReadonlyMap<string, ReadonlySet<string>>;

    constructor(tables: OverrideTables = DEFAULT_OVERRIDES) {
        this.keepTypes = new Set(tables.keepTypes);
        this.globalMembers = new Set(tables.keepMembers[WILDCARD] ?? []);
        this.typeMembers = new Map(Object.entries(tables.keepMembers)
            .filter(([type]) => type !== WILDCARD)
            .map(([type, members]) => [type, new Set(members)]));
    }

    isAlwaysKept(type: string) {
        return this.keepTypes.has(type);
    }

    /** Wildcard exemption: no member of this type may be rejected */
    keepsAllMembers(type: string) {
        return this.typeMembers.get(type)?.has(WILDCARD) ?? false;
    }

    isListedMember(type: string, member: string) {
        return this.globalMembers.has(member) || (this.typeMembers.get(type)?.has(member) ?? false);
    }

    /**
     * Members of `type` that survive without usage evidence:
     * - listed globally or for this type (all of them under a wildcard)
     * - named like the type itself; constructors must survive construction paths
     * - declared pure virtual anywhere in the ancestor chain, including `type`;
     *   the generated concrete type is invalid if such a member is missing
     */
    async forcedMembers(catalog: TypeCatalog, type: string): Promise<Set<string>> {
        const members = await catalog.members(type);
        if(this.keepsAllMembers(type)) return new Set(members);
        const ancestors = await catalog.ancestors(type);
        const forced = new Set<string>();
        for(const member of members) {
            if(this.isListedMember(type, member) || member === type) {
                forced.add(member);
                continue;
            }
            for(const ancestor of ancestors) {
                if(await catalog.isPureVirtual(ancestor, member)) {
                    forced.add(member);
                    break;
                }
            }
        }
        return forced;
    }
}
