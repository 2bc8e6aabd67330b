import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from './platformSchema.json';
import type { Environment } from '../core/macros';

// OS/arch pair. An empty side matches any value ('linux/' is every Linux target).
export interface Platform {
	readonly os: string;
	readonly arch: string;
}

type NameList = '*' | string[];

export interface MacroRule {
	names: string[];
	value?: number;
	os: NameList;
	arch: NameList;
	anyArch?: boolean; // also define for the OS-only platform of each OS
	anyOs?: boolean; // also define for the arch-only platform of each arch
}

export interface PlatformFile {
	os: string[];
	arch: string[];
	aliases?: { os?: Record<string, string>; arch?: Record<string, string> };
	macros: MacroRule[];
}

export const DEFAULT_PLATFORMS_FILE = path.resolve(__dirname, '..', '..', 'data', 'platforms.yaml');

export function platformKey(p: Platform): string {
	return `${p.os}/${p.arch}`;
}

// Orders by OS, then by arch.
export function comparePlatforms(a: Platform, b: Platform): number {
	if (a.os !== b.os) return a.os < b.os ? -1 : 1;
	if (a.arch !== b.arch) return a.arch < b.arch ? -1 : 1;
	return 0;
}

function dealias(value: string, aliases: Record<string, string> | undefined): string {
	if (aliases && Object.prototype.hasOwnProperty.call(aliases, value)) return aliases[value] ?? value;
	return value;
}

export class PlatformTable {
	private readonly knownOs: readonly string[];
	private readonly knownArch: readonly string[];
	private readonly osAliases: Record<string, string>;
	private readonly archAliases: Record<string, string>;
	private readonly envs = new Map<string, Record<string, number>>();

	constructor(file: PlatformFile) {
		this.knownOs = file.os;
		this.knownArch = file.arch;
		this.osAliases = file.aliases?.os ?? {};
		this.archAliases = file.aliases?.arch ?? {};
		for (const rule of file.macros) this.addRule(rule);
	}

	private expand(list: NameList, known: readonly string[], what: string): string[] {
		if (list === '*') return [...known];
		for (const name of list) {
			if (!known.includes(name)) throw new Error(`macro table refers to unknown ${what} "${name}"`);
		}
		return list;
	}

	private addRule(rule: MacroRule) {
		const oses = this.expand(rule.os, this.knownOs, 'OS');
		const archs = this.expand(rule.arch, this.knownArch, 'architecture');
		const targets: Platform[] = [];
		for (const os of oses) for (const arch of archs) targets.push({ os, arch });
		if (rule.anyArch) for (const os of oses) targets.push({ os, arch: '' });
		if (rule.anyOs) for (const arch of archs) targets.push({ os: '', arch });
		const value = rule.value ?? 1;
		for (const p of targets) {
			const key = platformKey(p);
			let env = this.envs.get(key);
			if (!env) { env = {}; this.envs.set(key, env); }
			for (const name of rule.names) env[name] = value;
		}
	}

	createPlatform(os: string, arch: string): Platform {
		const p: Platform = { os: dealias(os, this.osAliases), arch: dealias(arch, this.archAliases) };
		if (!p.os && !p.arch) throw new Error('platform needs an OS, an architecture or both');
		if (p.os && !this.knownOs.includes(p.os)) {
			throw new Error(`unknown OS ${p.os}, expected one of known values ${this.knownOs.join(', ')} or an alias ${Object.keys(this.osAliases).join(', ')}`);
		}
		if (p.arch && !this.knownArch.includes(p.arch)) {
			throw new Error(`unknown architecture ${p.arch}, expected one of known values ${this.knownArch.join(', ')} or an alias ${Object.keys(this.archAliases).join(', ')}`);
		}
		return p;
	}

	// 'os/arch', 'os/' or '/arch'
	parsePlatform(value: string): Platform {
		const parts = value.trim().split('/');
		const [os, arch] = parts;
		if (parts.length !== 2 || os === undefined || arch === undefined) throw new Error(`invalid platform "${value}", expected <os>/<arch>`);
		return this.createPlatform(os.trim(), arch.trim());
	}

	// Predefined macros of a platform; empty when the table defines none for it.
	environmentFor(p: Platform): Environment {
		return { ...(this.envs.get(platformKey(p)) ?? {}) };
	}

	// Every platform with at least one predefined macro, sorted.
	platforms(): Platform[] {
		const out: Platform[] = [];
		for (const key of this.envs.keys()) {
			const [os = '', arch = ''] = key.split('/');
			out.push({ os, arch });
		}
		return out.sort(comparePlatforms);
	}
}

export function parsePlatformTable(raw: string, source = 'platform table'): PlatformTable {
	const obj: unknown = yaml.load(raw, { json: true });
	if (!obj) throw new Error(`${source} appears to be empty or could not be parsed`);
	const ajv = new Ajv2020({ allErrors: true, strict: false });
	const validate = ajv.compile<PlatformFile>(schema);
	if (!validate(obj)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath} ${e.message}`).join('\n');
		throw new Error(`${source} schema validation failed:\n${msg}`);
	}
	return new PlatformTable(obj);
}

export async function loadPlatformTable(file: string = DEFAULT_PLATFORMS_FILE): Promise<PlatformTable> {
	const resolved = path.resolve(file);
	const raw = await fs.readFile(resolved, 'utf8');
	return parsePlatformTable(raw, `Platform file "${resolved}"`);
}
