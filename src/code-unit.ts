import {Node, SourceFile, SyntaxKind} from 'ts-morph';
import { isIdentifier } from './identifiers';

/**
 * One compiled/parsed chunk of application code, seen only through the two
 * questions the harvester asks.  Implemented once per code representation.
 */
export interface CodeUnit {
    /** Human-readable origin, used in diagnostics */
    readonly label: string;
    /** Names this unit references directly, excluding those inside nested units */
    referencedNames(): Iterable<string>;
    /** Functions, methods and class bodies declared directly inside this unit */
    nestedUnits(): Iterable<CodeUnit>;
}

/** Walk a unit and everything nested in it, adding every referenced name to `into`. */
export function collectIdentifiers(root: CodeUnit, into = new Set<string>()) {
    const stack: CodeUnit[] = [root];
    for(let unit = stack.pop(); unit; unit = stack.pop()) {
        for(const name of unit.referencedNames()) into.add(name);
        for(const nested of unit.nestedUnits()) stack.push(nested);
    }
    return into;
}

/** Nodes that start a new code unit rather than belonging to the enclosing one. */
function isUnitBoundary(node: Node) {
    return Node.isFunctionDeclaration(node)
        || Node.isFunctionExpression(node)
        || Node.isArrowFunction(node)
        || Node.isMethodDeclaration(node)
        || Node.isConstructorDeclaration(node)
        || Node.isGetAccessorDeclaration(node)
        || Node.isSetAccessorDeclaration(node)
        || Node.isClassDeclaration(node)
        || Node.isClassExpression(node);
}

/**
 * A unit rooted at a ts-morph node: a whole source file, or a function/class
 * within one.  Names are gathered from identifier tokens and from string
 * literals that look like identifiers (`obj['show']`, `Reflect.get(w, 'show')`).
 */
export class SyntaxCodeUnit implements CodeUnit {
    readonly label: string;
    private names: string[] | undefined;
    private nested: SyntaxCodeUnit[] | undefined;

    constructor(private readonly root: Node, label: string) {
        this.label = label;
    }

    referencedNames(): Iterable<string> {
        this.scan();
        return this.names ?? [];
    }

    nestedUnits(): Iterable<CodeUnit> {
        this.scan();
        return this.nested ?? [];
    }

    private scan() {
        if(this.names) return;
        const names: string[] = [];
        const nested: SyntaxCodeUnit[] = [];
        const pending: Node[] = [];
        this.root.forEachChild(child => { pending.push(child); });
        for(let node = pending.pop(); node; node = pending.pop()) {
            if(isUnitBoundary(node)) {
                nested.push(new SyntaxCodeUnit(node, `${this.label} > ${describeUnit(node)}`));
                continue;
            }
            const name = nameOf(node);
            if(name !== undefined) names.push(name);
            node.forEachChild(child => { pending.push(child); });
        }
        this.names = names;
        this.nested = nested;
    }
}

function nameOf(node: Node): string | undefined {
    if(Node.isIdentifier(node)) return node.getText();
    // `this.#field`
    if(Node.isPrivateIdentifier(node)) return node.getText().slice(1);
    if(Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
        const text = node.getLiteralText();
        return isIdentifier(text) ? text : undefined;
    }
    return undefined;
}

function describeUnit(node: Node) {
    const named = node.asKind(SyntaxKind.FunctionDeclaration) ?? node.asKind(SyntaxKind.MethodDeclaration) ?? node.asKind(SyntaxKind.ClassDeclaration)
        ?? node.asKind(SyntaxKind.GetAccessor) ?? node.asKind(SyntaxKind.SetAccessor);
    const name = named?.getName();
    return `${node.getKindName()}${name ? ` ${name}` : ''}@${node.getStartLineNumber()}`;
}

export function createSourceFileUnit(sourceFile: SourceFile, label: string): CodeUnit {
    return new SyntaxCodeUnit(sourceFile, label);
}
