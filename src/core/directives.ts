import type { Diagnostic } from '../analysisTypes';

export type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=';

// Condition of an #if / #elif. Every node evaluates to an integer; nonzero means true.
export type Expr =
	| { readonly kind: 'Defined'; readonly name: string }
	| { readonly kind: 'Not'; readonly operand: Expr }
	| { readonly kind: 'And'; readonly left: Expr; readonly right: Expr }
	| { readonly kind: 'Or'; readonly left: Expr; readonly right: Expr }
	| { readonly kind: 'Compare'; readonly left: Expr; readonly op: CompareOp; readonly right: Expr }
	// function-like macro invoked inside a condition; never expanded
	| { readonly kind: 'Apply'; readonly name: string; readonly args: readonly Expr[] }
	| { readonly kind: 'Ident'; readonly name: string }
	| { readonly kind: 'ConstantInt'; readonly value: number };

export type BranchKind = 'if' | 'elif' | 'else';

export interface ConditionalBranch {
	readonly kind: BranchKind;
	readonly condition?: Expr; // absent only for 'else'
	readonly body: readonly Directive[];
}

export interface IncludeDirective {
	readonly kind: 'Include';
	readonly path: string;
	readonly system: boolean; // <...> rather than "..."
	readonly line: number;
}

export type Directive =
	| IncludeDirective
	// args is null for object-like macros
	| { readonly kind: 'Define'; readonly name: string; readonly args: readonly string[] | null; readonly body: readonly string[] }
	| { readonly kind: 'Undefine'; readonly name: string }
	| { readonly kind: 'IfBlock'; readonly branches: readonly ConditionalBranch[] };

export interface SourceInfo {
	readonly directives: readonly Directive[];
	readonly hasMain: boolean;
	readonly diagnostics: readonly Diagnostic[];
}

const NEGATED: Record<CompareOp, CompareOp> = { '==': '!=', '!=': '==', '<': '>=', '<=': '>', '>': '<=', '>=': '<' };

export function negateCompare(op: CompareOp): CompareOp {
	return NEGATED[op];
}

export function formatExpr(e: Expr): string {
	switch (e.kind) {
		case 'Defined': return `defined(${e.name})`;
		case 'Not': return `!(${formatExpr(e.operand)})`;
		case 'And': return `${formatExpr(e.left)} && ${formatExpr(e.right)}`;
		case 'Or': return `${formatExpr(e.left)} || ${formatExpr(e.right)}`;
		case 'Compare': return `${formatExpr(e.left)} ${e.op} ${formatExpr(e.right)}`;
		case 'Apply': return `${e.name}(${e.args.map(formatExpr).join(', ')})`;
		case 'Ident': return e.name;
		case 'ConstantInt': return String(e.value);
	}
}

export function formatDirective(d: Directive): string {
	switch (d.kind) {
		case 'Include':
			return d.system ? `#include <${d.path}>` : `#include "${d.path}"`;
		case 'Define': {
			const head = d.args ? `${d.name}(${d.args.join(', ')})` : d.name;
			return d.body.length ? `#define ${head} ${d.body.join(' ')}` : `#define ${head}`;
		}
		case 'Undefine':
			return `#undef ${d.name}`;
		case 'IfBlock': {
			const lines: string[] = [];
			for (const b of d.branches) {
				lines.push(b.condition ? `#${b.kind} ${formatExpr(b.condition)}` : `#${b.kind}`);
				for (const inner of b.body) lines.push(formatDirective(inner));
			}
			lines.push('#endif');
			return lines.join('\n');
		}
	}
}

// Every include in the tree, whatever the conditions guarding it.
export function collectIncludes(info: Pick<SourceInfo, 'directives'>): IncludeDirective[] {
	const out: IncludeDirective[] = [];
	const walk = (directives: readonly Directive[]) => {
		for (const d of directives) {
			if (d.kind === 'Include') out.push(d);
			else if (d.kind === 'IfBlock') for (const b of d.branches) walk(b.body);
		}
	};
	walk(info.directives);
	return out;
}
