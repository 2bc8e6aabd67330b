import path from 'node:path';
import { DEFAULT_PATH_OPTIONS, type PathVariantOptions, includeCandidates, pathVariants } from './includePaths';

export const HEADER_EXTENSIONS = ['.h', '.hh', '.hpp', '.hxx'] as const;

export type FileKind = 'header' | 'source';

export interface FileInfo {
	name: string; // relative to the directory being grouped
	kind: FileKind;
	// one entry per quoted include: the candidate paths it may refer to, tried in order
	includes: readonly (readonly string[])[];
}

export interface SourceGroup {
	sources: string[];
	dependsOn: string[];
	subGroups: string[]; // node ids merged into this group, empty unless a cycle collapsed
}

export type SourceGroups = Map<string, SourceGroup>;

// Raised when the grouping bookkeeping assigns one file twice.
export class GroupingInvariantError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'GroupingInvariantError';
	}
}

interface GraphNode {
	sources: string[];
	adjacency: Set<string>;
}

type DependencyGraph = Map<string, GraphNode>;

const HEADER_SET = new Set<string>(HEADER_EXTENSIONS);

export function fileNameIsHeader(name: string): boolean {
	return HEADER_SET.has(path.posix.extname(name));
}

export function fileNameToGroupId(name: string): string {
	const base = path.posix.basename(name);
	const ext = path.posix.extname(base);
	return ext ? base.slice(0, -ext.length) : base;
}

export function fileInfoFor(name: string, quotedIncludes: readonly string[]): FileInfo {
	return {
		name,
		kind: fileNameIsHeader(name) ? 'header' : 'source',
		includes: quotedIncludes.map(inc => includeCandidates(name, inc)),
	};
}

function debug(...args: unknown[]) {
	if (process.env.CC_DEPSCAN_DEBUG_GROUPS) console.log('[cc-depscan]', ...args);
}

function buildDependencyGraph(files: readonly FileInfo[], options: PathVariantOptions): DependencyGraph {
	const graph: DependencyGraph = new Map();
	const variantToId = new Map<string, string>();
	for (const f of files) {
		const id = fileNameToGroupId(f.name);
		if (!graph.has(id)) graph.set(id, { sources: [], adjacency: new Set() });
		for (const v of pathVariants(f.name, options)) variantToId.set(v, id);
	}
	for (const f of files) {
		const id = fileNameToGroupId(f.name);
		const node = graph.get(id);
		if (!node) throw new GroupingInvariantError(`no graph node for ${f.name}`);
		node.sources.push(f.name);
		for (const candidates of f.includes) {
			for (const c of candidates) {
				const target = variantToId.get(c);
				if (target === undefined) continue;
				node.adjacency.add(target);
				break;
			}
		}
	}
	return graph;
}

// Tarjan's algorithm; nodes and edges are visited in sorted order.
function stronglyConnectedComponents(graph: DependencyGraph): string[][] {
	let index = 0;
	const indices = new Map<string, number>();
	const lowLink = new Map<string, number>();
	const onStack = new Set<string>();
	const stack: string[] = [];
	const sccs: string[][] = [];

	const connect = (id: string) => {
		indices.set(id, index);
		lowLink.set(id, index);
		index++;
		stack.push(id);
		onStack.add(id);

		const adjacency = [...(graph.get(id)?.adjacency ?? [])].sort();
		for (const dep of adjacency) {
			const depIndex = indices.get(dep);
			if (depIndex === undefined) {
				connect(dep);
				lowLink.set(id, Math.min(lowLink.get(id) ?? 0, lowLink.get(dep) ?? 0));
			} else if (onStack.has(dep)) {
				lowLink.set(id, Math.min(lowLink.get(id) ?? 0, depIndex));
			}
		}

		if (lowLink.get(id) === indices.get(id)) {
			const scc: string[] = [];
			for (;;) {
				const w = stack.pop();
				if (w === undefined) break;
				onStack.delete(w);
				scc.push(w);
				if (w === id) break;
			}
			sccs.push(scc);
		}
	};

	for (const id of [...graph.keys()].sort()) {
		if (!indices.has(id)) connect(id);
	}
	return sccs;
}

// First header by name, or the first file when the group holds no header.
export function selectGroupName(files: readonly string[]): string {
	const headers = files.filter(fileNameIsHeader).sort();
	const first = headers[0] ?? [...files].sort()[0];
	if (first === undefined) throw new GroupingInvariantError('cannot name an empty group');
	return fileNameToGroupId(first);
}

// file name -> group id. Throws when a file belongs to more than one group.
export function sourceToGroupIds(groups: SourceGroups): Map<string, string> {
	const out = new Map<string, string>();
	for (const [id, group] of groups) {
		for (const file of group.sources) {
			const previous = out.get(file);
			if (previous !== undefined) {
				throw new GroupingInvariantError(`Inconsistent source groups, file ${file} assigned to both groups ${previous} and ${id}`);
			}
			out.set(file, id);
		}
	}
	return out;
}

function sortedGroups(groups: SourceGroups): SourceGroups {
	const out: SourceGroups = new Map();
	for (const id of [...groups.keys()].sort()) {
		const g = groups.get(id);
		if (!g) continue;
		out.set(id, { sources: [...g.sources].sort(), dependsOn: [...g.dependsOn].sort(), subGroups: [...g.subGroups].sort() });
	}
	return out;
}

// Partitions the files of one directory into groups that must compile together.
// A header and its implementation share a base name and always share a group;
// include cycles collapse into one group.
export function groupSources(files: readonly FileInfo[], options: Partial<PathVariantOptions> = {}): SourceGroups {
	const graph = buildDependencyGraph(files, { ...DEFAULT_PATH_OPTIONS, ...options });
	const sccs = stronglyConnectedComponents(graph);

	const groups: SourceGroups = new Map();
	const nodeToGroup = new Map<string, string>();
	for (const scc of sccs) {
		const sources = scc.flatMap(id => graph.get(id)?.sources ?? []);
		const name = selectGroupName(sources);
		for (const id of scc) nodeToGroup.set(id, name);
		groups.set(name, { sources, dependsOn: [], subGroups: scc.length > 1 ? scc : [] });
		if (scc.length > 1) debug('merged cyclic nodes', scc.join(', '), 'into', name);
	}

	for (const [name, group] of groups) {
		const deps = new Set<string>();
		for (const id of new Set(group.sources.map(fileNameToGroupId))) {
			for (const adj of graph.get(id)?.adjacency ?? []) {
				const target = nodeToGroup.get(adj);
				if (target !== undefined && target !== name) deps.add(target);
			}
		}
		group.dependsOn = [...deps];
	}

	const result = sortedGroups(groups);
	sourceToGroupIds(result);
	debug('groups', [...result.keys()].join(', '));
	return result;
}

// One group per base name, without looking at includes.
export function identitySourceGroups(files: readonly Pick<FileInfo, 'name'>[]): SourceGroups {
	const groups: SourceGroups = new Map();
	for (const f of files) {
		const id = fileNameToGroupId(f.name);
		const g = groups.get(id);
		if (g) g.sources.push(f.name);
		else groups.set(id, { sources: [f.name], dependsOn: [], subGroups: [] });
	}
	return sortedGroups(groups);
}
