export { type Cursor, CURSOR_INIT, advanceCursor, formatCursor } from './core/cursor';
export { type Token, type TokenKind, type Span, type DirectiveKeyword, DIRECTIVE_KEYWORDS, TokenStream, isTrivia } from './core/tokens';
export { Tokenizer, TokenizeError, type TokenizeErrorCode, tokenize, tokenizeAll } from './core/tokenizer';
export {
	type CompareOp, type Expr, type BranchKind, type ConditionalBranch, type IncludeDirective, type Directive, type SourceInfo,
	negateCompare, formatExpr, formatDirective, collectIncludes,
} from './core/directives';
export { ExprParseError, parseExpr, evalExpr, evaluate } from './core/expr';
export { parseSource } from './core/parser';
export { reachableIncludes } from './core/reachability';
export { type Environment, type MacroDefinition, parseIntLiteral, parseMacro, parseMacros } from './core/macros';
export {
	type TargetEnvironment, type AnalyzedInclude, type FileAnalysis, type DirectoryAnalysis, type AnalyzeDirectoryOptions,
	analyzeSource, analyzeDirectory, resolveTargets,
} from './core/pipeline';
export {
	type FileInfo, type FileKind, type SourceGroup, type SourceGroups, GroupingInvariantError, HEADER_EXTENSIONS,
	fileInfoFor, fileNameIsHeader, fileNameToGroupId, groupSources, identitySourceGroups, selectGroupName, sourceToGroupIds,
} from './grouping/sourceGroups';
export { type IncludeSearch, type PathVariantOptions, includeCandidates, joinPath, pathVariants, transformIncludePath } from './grouping/includePaths';
export {
	type Platform, type PlatformFile, type MacroRule, PlatformTable, DEFAULT_PLATFORMS_FILE,
	comparePlatforms, loadPlatformTable, parsePlatformTable, platformKey,
} from './platform/platforms';
export { type Diagnostic, type DiagCode, SCAN_DIAGCODES, normalizeDiagCode } from './analysisTypes';
export { type ScanSettings, filterDiagnostics, normalizeSettings, parseDisabledDiagList } from './settings';
