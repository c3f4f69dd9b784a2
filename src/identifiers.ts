/** Names harvested from application code.  Order is irrelevant, duplicates collapse. */
export type IdentifierSet = ReadonlySet<string>;

const identifierRe = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** Is this string lexically usable as an identifier? */
export function isIdentifier(text: string) {
    return identifierRe.test(text);
}
