import { TypeCatalog } from './catalog';
import { IdentifierSet } from './identifiers';
import { Logger, silentLogger } from './logging';
import { OverridePolicy } from './policy';

/** Why a type entered the useful set */
export enum UsefulReason {
    /** Named in application code */
    Harvested = 'harvested',
    /** Listed in the always-keep types */
    Policy = 'policy',
    /** Ancestor of a type that was already useful */
    Ancestor = 'ancestor',
    /** Flows through a kept member of a useful type */
    Related = 'related',
}

/** Hooks fired as the closure grows; used by the progress view and by tests. */
export interface ClosureObserver {
    typeAdded?(type: string, reason: UsefulReason): void;
    typeProcessed?(type: string, pending: number): void;
}

export interface ClosureOptions {
    catalog: TypeCatalog;
    policy: OverridePolicy;
    identifiers: IdentifierSet;
    log?: Logger;
    observer?: ClosureObserver;
}

export interface ClosureResult {
    /** Every type judged reachable; closed under `ancestors` */
    useful: ReadonlySet<string>;
    /** Per useful type: policy-forced members plus harvested members */
    keptMembers: ReadonlyMap<string, ReadonlySet<string>>;
    /** Per useful type: the policy-forced part alone */
    forcedMembers: ReadonlyMap<string, ReadonlySet<string>>;
    /** Types in the order the worklist processed them; each appears once */
    processed: readonly string[];
}

/**
 * Worklist fixpoint over the power set of catalog types.  The useful set only
 * grows and the catalog is finite, so the loop terminates; each type is
 * processed at most once.
 */
export async function computeClosure(options: ClosureOptions): Promise<ClosureResult> {
    const { catalog, policy, identifiers, observer } = options;
    const log = options.log ?? silentLogger;

    const useful = new Set<string>();
    const worklist: string[] = [];
    let head = 0;

    async function addWithAncestors(type: string, reason: UsefulReason) {
        for(const ancestor of await catalog.ancestors(type)) {
            if(useful.has(ancestor)) continue;
            useful.add(ancestor);
            worklist.push(ancestor);
            log.debug(`USEFUL ${ancestor}`);
            observer?.typeAdded?.(ancestor, ancestor === type ? reason : UsefulReason.Ancestor);
        }
    }

    // Seed from names used directly in the code, plus types the policy always keeps
    for(const type of await catalog.allTypes()) {
        if(identifiers.has(type)) await addWithAncestors(type, UsefulReason.Harvested);
        else if(policy.isAlwaysKept(type)) await addWithAncestors(type, UsefulReason.Policy);
    }

    const forcedMembers = new Map<string, Set<string>>();
    const keptMembers = new Map<string, Set<string>>();
    const processed: string[] = [];
    const visited = new Set<string>();

    while(head < worklist.length) {
        const type = worklist[head++];
        if(visited.has(type)) continue;
        visited.add(type);
        processed.push(type);
        const pending = worklist.length - head;
        log.debug(`CHECKING ${type} [ ${pending} more to do ]`);

        const members = await catalog.members(type);
        const forced = await policy.forcedMembers(catalog, type);
        const kept = new Set(forced);
        for(const member of members) {
            if(identifiers.has(member)) kept.add(member);
        }
        forcedMembers.set(type, forced);
        keptMembers.set(type, kept);

        for(const member of members) {
            if(!kept.has(member)) continue;
            for(const related of await catalog.relatedTypes(type, member)) {
                await addWithAncestors(related, UsefulReason.Related);
            }
        }
        observer?.typeProcessed?.(type, worklist.length - head);
    }

    return { useful, keptMembers, forcedMembers, processed };
}
