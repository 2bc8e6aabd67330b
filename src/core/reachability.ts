import type { Directive, IncludeDirective, SourceInfo } from './directives';
import { evaluate } from './expr';
import { type Environment, parseIntLiteral } from './macros';

type MutableEnv = Record<string, number>;

function defineValue(d: Extract<Directive, { kind: 'Define' }>): number {
	if (d.args !== null) return 1;
	const first = d.body[0];
	if (first === undefined) return 1;
	return parseIntLiteral(first) ?? 0;
}

function walk(directives: readonly Directive[], env: MutableEnv, out: IncludeDirective[]) {
	for (const d of directives) {
		switch (d.kind) {
			case 'Include':
				out.push(d);
				break;
			case 'Define':
				env[d.name] = defineValue(d);
				break;
			case 'Undefine':
				delete env[d.name];
				break;
			case 'IfBlock': {
				const taken = d.branches.find(b => !b.condition || evaluate(b.condition, env));
				// defines inside a branch stay inside it
				if (taken) walk(taken.body, { ...env }, out);
				break;
			}
		}
	}
}

// Includes reachable under `env`, in source order, duplicates kept. `env` is not modified.
export function reachableIncludes(info: Pick<SourceInfo, 'directives'>, env: Environment): IncludeDirective[] {
	const out: IncludeDirective[] = [];
	walk(info.directives, { ...env }, out);
	return out;
}
