import { type DiagCode, type Diagnostic, SCAN_DIAGCODES } from '../analysisTypes';
import { type FileKind, type SourceGroups, fileInfoFor, fileNameIsHeader, groupSources } from '../grouping/sourceGroups';
import type { PathVariantOptions } from '../grouping/includePaths';
import { type PlatformTable, platformKey } from '../platform/platforms';
import { filterDiagnostics, type ScanSettings } from '../settings';
import { type SourceInfo, collectIncludes } from './directives';
import { type Environment, parseMacros } from './macros';
import { parseSource } from './parser';
import { reachableIncludes } from './reachability';
import { TokenizeError } from './tokenizer';

// A named macro environment, usually one target platform.
export interface TargetEnvironment {
	name: string;
	env: Environment;
}

export interface AnalyzedInclude {
	path: string;
	system: boolean;
	line: number;
	platforms: string[]; // targets under which the include is reachable
	platformSpecific: boolean; // some target does not reach it
}

export interface FileAnalysis {
	name: string;
	kind: FileKind;
	hasMain: boolean;
	includes: AnalyzedInclude[];
	diagnostics: Diagnostic[];
	parsed: boolean; // false when the tokenizer gave up on the file
}

export interface DirectoryAnalysis {
	files: FileAnalysis[];
	groups: SourceGroups;
}

export interface AnalyzeDirectoryOptions {
	targets?: readonly TargetEnvironment[];
	grouping?: Partial<PathVariantOptions>;
	settings?: Pick<ScanSettings, 'diagnostics' | 'debug'>;
}

function tokenizerDiagnostic(err: TokenizeError): Diagnostic {
	const code = err.code === 'comment-unterminated' ? SCAN_DIAGCODES.UNTERMINATED_COMMENT : SCAN_DIAGCODES.INVALID_CONTINUATION;
	return { code, message: err.message, cursor: err.cursor, severity: 'error' };
}

function annotateIncludes(info: SourceInfo, targets: readonly TargetEnvironment[]): AnalyzedInclude[] {
	const reached = targets.map(t => ({ name: t.name, includes: new Set(reachableIncludes(info, t.env)) }));
	return collectIncludes(info).map(inc => {
		const platforms = reached.filter(r => r.includes.has(inc)).map(r => r.name);
		return {
			path: inc.path,
			system: inc.system,
			line: inc.line,
			platforms,
			platformSpecific: platforms.length < targets.length,
		};
	});
}

// Structural facts of one file. A tokenizer failure does not throw: the file is reported
// as unparsed with no includes.
export function analyzeSource(name: string, content: string | Uint8Array, targets: readonly TargetEnvironment[] = []): FileAnalysis {
	const kind: FileKind = fileNameIsHeader(name) ? 'header' : 'source';
	let info: SourceInfo;
	try {
		info = parseSource(content);
	} catch (err) {
		if (!(err instanceof TokenizeError)) throw err;
		console.warn(`[cc-depscan] ${name}: ${err.message}, skipping dependency inference`);
		return { name, kind, hasMain: false, includes: [], diagnostics: [tokenizerDiagnostic(err)], parsed: false };
	}
	return {
		name,
		kind,
		hasMain: info.hasMain,
		includes: annotateIncludes(info, targets),
		diagnostics: [...info.diagnostics],
		parsed: true,
	};
}

// Analyses every file of one directory, then groups them by their quoted includes.
export function analyzeDirectory(files: readonly { name: string; content: string | Uint8Array }[], options: AnalyzeDirectoryOptions = {}): DirectoryAnalysis {
	const disabled = options.settings?.diagnostics.disable ?? new Set<DiagCode>();
	const analyses = files.map(f => {
		const a = analyzeSource(f.name, f.content, options.targets);
		if (options.settings?.debug) console.log(`[cc-depscan] ${f.name}: ${a.includes.length} includes, ${a.diagnostics.length} diagnostics${a.hasMain ? ', has main' : ''}`);
		return { ...a, diagnostics: filterDiagnostics(a.diagnostics, disabled) };
	});
	const infos = analyses.map(a => fileInfoFor(a.name, a.includes.filter(i => !i.system).map(i => i.path)));
	return { files: analyses, groups: groupSources(infos, options.grouping) };
}

// One target per configured platform, each with the settings' -D macros on top.
export function resolveTargets(table: PlatformTable, settings: Pick<ScanSettings, 'platforms' | 'macros'>): TargetEnvironment[] {
	const extra = parseMacros(settings.macros);
	return settings.platforms.map(spec => {
		const p = table.parsePlatform(spec);
		return { name: platformKey(p), env: { ...table.environmentFor(p), ...extra } };
	});
}
