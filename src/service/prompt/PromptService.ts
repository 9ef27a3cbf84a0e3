import fs from 'fs/promises';
import path from 'path';
import Handlebars from 'handlebars';
import { PromptId, type PromptVariables, PROMPT_REGISTRY } from './PromptId';
import { registerTemplateEngineHelpers } from '@/core/template-engine-helper';

/**
 * Unified prompt service with code-first templates and optional file overrides.
 */
export class PromptService {
	private readonly overrides = new Map<PromptId, string | null>();
	private readonly compiled = new Map<string, Handlebars.TemplateDelegate>();

	/**
	 * @param promptFolder folder searched for `<prompt-id>.prompt.md` overrides
	 */
	constructor(private readonly promptFolder?: string) {
		registerTemplateEngineHelpers();
	}

	/**
	 * Render a prompt with variables.
	 * First checks for file override, then falls back to code template.
	 */
	async render<K extends PromptId>(id: K, variables: PromptVariables[K]): Promise<string> {
		const override = await this.loadOverride(id);
		const source = override ?? PROMPT_REGISTRY[id].template;
		return this.compile(source)(variables).trim();
	}

	/**
	 * System message registered for the prompt, if any.
	 */
	getSystem(id: PromptId): string | undefined {
		return PROMPT_REGISTRY[id].system;
	}

	private compile(source: string): Handlebars.TemplateDelegate {
		let template = this.compiled.get(source);
		if (!template) {
			// Prompts are plain text; HTML escaping would mangle quotes and ampersands.
			template = Handlebars.compile(source, { noEscape: true });
			this.compiled.set(source, template);
		}
		return template;
	}

	/**
	 * Load prompt override from the prompt folder if it exists.
	 */
	private async loadOverride(id: PromptId): Promise<string | undefined> {
		if (!this.promptFolder) return undefined;
		const cached = this.overrides.get(id);
		if (cached !== undefined) {
			return cached ?? undefined;
		}

		const filePath = path.join(this.promptFolder, `${id}.prompt.md`);
		let content: string | null = null;
		try {
			content = (await fs.readFile(filePath, 'utf8')).trim() || null;
		} catch (error) {
			if (!isMissingFileError(error)) {
				console.warn(`[PromptService] Failed to load prompt override for ${id}:`, error);
			}
		}
		this.overrides.set(id, content);
		return content ?? undefined;
	}
}

function isMissingFileError(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
