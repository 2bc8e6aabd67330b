import path from 'node:path';

export interface IncludeSearch {
	stripIncludePrefix: string;
	includePrefix: string;
}

export interface PathVariantOptions {
	rel: string; // package directory, relative to the repository root
	stripIncludePrefix: string;
	includePrefix: string;
	searches: readonly IncludeSearch[];
}

export const DEFAULT_PATH_OPTIONS: PathVariantOptions = { rel: '', stripIncludePrefix: '', includePrefix: '', searches: [] };

// Joins and cleans; empty segments are skipped and no segments give ''.
export function joinPath(...segments: string[]): string {
	const parts = segments.filter(s => s !== '');
	if (!parts.length) return '';
	const joined = path.posix.join(...parts);
	return joined.length > 1 && joined.endsWith('/') ? joined.slice(0, -1) : joined;
}

function trimPathPrefix(p: string, prefix: string): string {
	if (prefix === '' || prefix === '.') return p;
	if (p === prefix) return '';
	if (p.startsWith(prefix + '/')) return p.slice(prefix.length + 1);
	return p;
}

// Path a header is included by once strip_include_prefix and include_prefix apply.
// An absolute strip prefix is repository relative, a relative one is package relative;
// an include prefix without a strip prefix strips the package directory.
export function transformIncludePath(rel: string, stripIncludePrefix: string, includePrefix: string, headerRel: string): string {
	let strip = '';
	if (stripIncludePrefix.startsWith('/')) strip = stripIncludePrefix.slice(1);
	else if (stripIncludePrefix !== '') strip = joinPath(rel, stripIncludePrefix);
	else if (includePrefix !== '') strip = rel;
	return joinPath(includePrefix, trimPathPrefix(headerRel, strip));
}

// Every string a sibling file may be included by.
export function pathVariants(name: string, options: PathVariantOptions = DEFAULT_PATH_OPTIONS): string[] {
	const fullRel = joinPath(options.rel, name);
	const variants = new Set<string>([
		fullRel,
		transformIncludePath(options.rel, options.stripIncludePrefix, options.includePrefix, fullRel),
		name,
	]);
	for (const s of options.searches) variants.add(transformIncludePath(options.rel, s.stripIncludePrefix, s.includePrefix, fullRel));
	variants.delete('');
	return [...variants];
}

// The include as written, then resolved against the including file's directory.
export function includeCandidates(fileName: string, includePath: string): string[] {
	const relative = joinPath(path.posix.dirname(fileName), includePath);
	return relative === includePath ? [includePath] : [includePath, relative];
}
