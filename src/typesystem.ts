import { RejectionRecord } from './rejections';

function escapeAttribute(value: string) {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

function rejectionElement(record: RejectionRecord) {
    let attributes = `class="${escapeAttribute(record.type)}"`;
    if(record.kind === 'member') {
        const attribute = record.memberKind === 'field' ? 'field-name' : 'function-name';
        attributes += ` ${attribute}="${escapeAttribute(record.member)}"`;
    }
    return `<rejection ${attributes}/>`;
}

/**
 * Render the stream as a typesystem document that the binding generator can
 * load alongside the package's own typesystem to drop the rejected API.
 */
export function formatTypesystem(records: Iterable<RejectionRecord>, packageName: string) {
    const lines = [`<typesystem package="${escapeAttribute(packageName)}">`];
    for(const record of records) {
        lines.push(`    ${rejectionElement(record)}`);
    }
    lines.push('</typesystem>');
    return lines.join('\n') + '\n';
}

export function formatJson(records: readonly RejectionRecord[]) {
    return JSON.stringify(records, null, 2) + '\n';
}
