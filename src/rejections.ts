import assert from 'assert';
import { sortBy } from 'lodash-es';
import { MemberKind, TypeCatalog } from './catalog';
import { ClosureResult } from './closure';
import { IdentifierSet } from './identifiers';
import { OverridePolicy } from './policy';

/** The whole type is excluded from the build */
export interface TypeRejection {
    kind: 'type';
    type: string;
}
/** The type is kept but this member is excluded */
export interface MemberRejection {
    kind: 'member';
    type: string;
    member: string;
    memberKind: MemberKind;
}
export type RejectionRecord = TypeRejection | MemberRejection;

export interface RejectionInput {
    catalog: TypeCatalog;
    policy: OverridePolicy;
    identifiers: IdentifierSet;
    closure: ClosureResult;
}

/** Where a cataloged type ends up.  Checked in this order, so each type has exactly one. */
export enum TypeStatus {
    AlwaysKept = 'always-kept',
    Useful = 'useful',
    Rejected = 'rejected',
}

/** Where a member of a kept type ends up.  Checked in this order, so each member has exactly one. */
export enum MemberStatus {
    Harvested = 'harvested',
    PolicyKept = 'policy-kept',
    Rejected = 'rejected',
}

export function classifyType(type: string, policy: OverridePolicy, closure: ClosureResult) {
    if(policy.isAlwaysKept(type)) return TypeStatus.AlwaysKept;
    if(closure.useful.has(type)) return TypeStatus.Useful;
    return TypeStatus.Rejected;
}

function keptMembersOf(type: string, closure: ClosureResult) {
    const kept = closure.keptMembers.get(type);
    assert(kept, `kept type ${type} was never processed by the closure`);
    return kept;
}

export function classifyMember(type: string, member: string, input: Pick<RejectionInput, 'identifiers' | 'closure'>) {
    if(input.identifiers.has(member)) return MemberStatus.Harvested;
    if(keptMembersOf(type, input.closure).has(member)) return MemberStatus.PolicyKept;
    return MemberStatus.Rejected;
}

/**
 * Everything in the catalog that the closure did not reach, in canonical order:
 * type name ascending, then member name ascending.  Types under a wildcard
 * member exemption never produce member rejections.
 */
export async function findRejections(input: RejectionInput): Promise<RejectionRecord[]> {
    const { catalog, policy, closure } = input;
    const records: RejectionRecord[] = [];
    for(const type of sortBy(await catalog.allTypes())) {
        if(classifyType(type, policy, closure) === TypeStatus.Rejected) {
            records.push({ kind: 'type', type });
            continue;
        }
        if(policy.keepsAllMembers(type)) continue;
        for(const member of sortBy(await catalog.members(type))) {
            if(classifyMember(type, member, input) !== MemberStatus.Rejected) continue;
            records.push({ kind: 'member', type, member, memberKind: await catalog.memberKind(type, member) });
        }
    }
    return records;
}

export interface RejectionSummary {
    types: Record<TypeStatus, number>;
    members: Record<MemberStatus, number>;
}

/** Counts for the exhaustive partition of types and of members on kept types. */
export async function summarizeRejections(input: RejectionInput): Promise<RejectionSummary> {
    const { catalog, policy, closure } = input;
    const summary: RejectionSummary = {
        types: { [TypeStatus.AlwaysKept]: 0, [TypeStatus.Useful]: 0, [TypeStatus.Rejected]: 0 },
        members: { [MemberStatus.Harvested]: 0, [MemberStatus.PolicyKept]: 0, [MemberStatus.Rejected]: 0 },
    };
    for(const type of await catalog.allTypes()) {
        const status = classifyType(type, policy, closure);
        summary.types[status]++;
        if(status === TypeStatus.Rejected || policy.keepsAllMembers(type)) continue;
        for(const member of await catalog.members(type)) {
            summary.members[classifyMember(type, member, input)]++;
        }
    }
    return summary;
}

export interface GroupedRejections {
    types: Set<string>;
    members: Map<string, Set<string>>;
}

/** Index the stream by type, the shape typesystem and build-file patchers look things up in. */
export function groupRejections(records: Iterable<RejectionRecord>): GroupedRejections {
    const grouped: GroupedRejections = { types: new Set(), members: new Map() };
    for(const record of records) {
        if(record.kind === 'type') {
            grouped.types.add(record.type);
        } else {
            const members = grouped.members.get(record.type) ?? new Set<string>();
            members.add(record.member);
            grouped.members.set(record.type, members);
        }
    }
    return grouped;
}
