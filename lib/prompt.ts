export class PolicyError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "PolicyError";
	}
}

export interface BooleanPolicy {
	kind: "boolean";
	id: string;
	label: string;
	text: string;
	default: boolean;
}

export interface ChoicePolicy {
	kind: "choice";
	id: string;
	label: string;
	options: Readonly<Record<string, string>>;
	default: string;
}

export type PromptPolicy = BooleanPolicy | ChoicePolicy;

export type PolicySelection = Readonly<Record<string, boolean | string>>;

export interface NamePair {
	source: string;
	target: string;
}

export interface ProjectProfile {
	characters: NamePair[];
	glossary: NamePair[];
}

export const EMPTY_PROFILE: ProjectProfile = { characters: [], glossary: [] };

export function booleanPolicy(id: string, label: string, text: string, defaultValue: boolean): BooleanPolicy {
	if (!id.trim() || !text.trim()) {
		throw new PolicyError(`Boolean policy "${id}" needs an id and prompt text`);
	}
	return { kind: "boolean", id, label, text, default: defaultValue };
}

export function choicePolicy(
	id: string,
	label: string,
	options: Record<string, string>,
	defaultValue: string,
): ChoicePolicy {
	if (!id.trim()) {
		throw new PolicyError("Choice policy needs an id");
	}
	if (Object.keys(options).length === 0) {
		throw new PolicyError(`Choice policy "${id}" has no options`);
	}
	if (!(defaultValue in options)) {
		throw new PolicyError(`Choice policy "${id}" default "${defaultValue}" is not one of its options`);
	}
	return { kind: "choice", id, label, options, default: defaultValue };
}

export const BASE_PROMPT = `You are a skilled translator of film and TV subtitles. I will show you numbered subtitle text; translate it into natural {targetLanguage}, following the rules below.

- Replace only the sentences, keeping every index number exactly as given. Keep the existing format with one blank line between entries.`;

export const DEFAULT_POLICIES: readonly PromptPolicy[] = [
	booleanPolicy(
		"omit_metadata",
		"Omit non-dialogue cues (e.g. [music playing])",
		"- Cues that carry information instead of dialogue, such as [dramatic music] or labels like STORY: or LANG:, must be left empty; keep only their index number.",
		true,
	),
	choicePolicy(
		"sentence_ending",
		"Sentence-ending punctuation",
		{
			omit_period:
				"- Drop only the '.' that ends a sentence, since this is spoken dialogue. Keep '?', '!' and other marks.",
			keep_all: "- Keep all sentence-ending punctuation ('.', '?', '!').",
		},
		"omit_period",
	),
	booleanPolicy(
		"quote_handling",
		"Remove quotation marks",
		"- Do not wrap lines in quotation marks. Remove any quotation marks the original has.",
		true,
	),
	choicePolicy(
		"multi_line_sentence",
		"Sentences spanning several lines",
		{
			combine:
				"- A single sentence goes on one line even if the original splits it over two lines.",
			keep_lines: "- If the original entry is split over several lines, split the translation the same way.",
		},
		"combine",
	),
	choicePolicy(
		"dash_dialogue",
		"Two speakers in one cue ('-')",
		{
			split_no_dash:
				"- When one entry holds two speakers marked with '-', put each on its own line without the '-'.",
			split_with_dash:
				"- When one entry holds two speakers marked with '-', put each on its own line and keep the '-'.",
		},
		"split_no_dash",
	),
];

export function defaultSelection(policies: readonly PromptPolicy[]): Record<string, boolean | string> {
	return Object.fromEntries(policies.map((policy) => [policy.id, policy.default]));
}

function parseBoolean(policyId: string, value: string): boolean {
	if (["true", "yes", "on", "1"].includes(value.toLowerCase())) return true;
	if (["false", "no", "off", "0"].includes(value.toLowerCase())) return false;
	throw new PolicyError(`Policy "${policyId}" expects true or false, got "${value}"`);
}

/**
 * Applies `key=value` overrides on top of each policy's default.
 */
export function resolvePolicySelection(
	policies: readonly PromptPolicy[],
	overrides: readonly string[] = [],
): Record<string, boolean | string> {
	const selection = defaultSelection(policies);

	for (const override of overrides) {
		const separator = override.indexOf("=");
		if (separator === -1) {
			throw new PolicyError(`Policy override "${override}" must look like key=value`);
		}
		const key = override.slice(0, separator).trim();
		const value = override.slice(separator + 1).trim();
		const policy = policies.find((candidate) => candidate.id === key);
		if (!policy) {
			throw new PolicyError(`Unknown policy "${key}"`);
		}

		if (policy.kind === "boolean") {
			selection[key] = parseBoolean(key, value);
		} else if (value in policy.options) {
			selection[key] = value;
		} else {
			throw new PolicyError(
				`Policy "${key}" must be one of ${Object.keys(policy.options).join(", ")}, got "${value}"`,
			);
		}
	}

	return selection;
}

function policyLine(policy: PromptPolicy, selection: PolicySelection): string | undefined {
	const chosen = selection[policy.id] ?? policy.default;
	if (policy.kind === "boolean") {
		return chosen === true ? policy.text : undefined;
	}
	return typeof chosen === "string" ? policy.options[chosen] : undefined;
}

function namePairLines(title: string, pairs: readonly NamePair[]): string[] {
	if (pairs.length === 0) return [];
	return ["", title, ...pairs.map((pair) => `- ${pair.source} -> ${pair.target}`)];
}

export interface InstructionInput {
	base?: string;
	policies?: readonly PromptPolicy[];
	selection?: PolicySelection;
	profile?: ProjectProfile;
	targetLanguage: string;
}

export function buildInstructions(input: InstructionInput): string {
	const policies = input.policies ?? DEFAULT_POLICIES;
	const selection = input.selection ?? defaultSelection(policies);
	const profile = input.profile ?? EMPTY_PROFILE;
	const base = (input.base ?? BASE_PROMPT).replaceAll("{targetLanguage}", input.targetLanguage);

	const lines = policies.reduce<string[]>((acc, policy) => {
		const line = policyLine(policy, selection);
		return line ? [...acc, line] : acc;
	}, [base.trimEnd()]);

	return [
		...lines,
		...namePairLines("Use these character names:", profile.characters),
		...namePairLines("Use these glossary terms:", profile.glossary),
	].join("\n");
}

export function buildTranslationPrompt(instructions: string, content: string): string {
	return `${instructions}\n\n[TEXT TO TRANSLATE]\n\n${content}`;
}
