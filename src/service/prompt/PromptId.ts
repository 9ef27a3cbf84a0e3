import * as entityExtractJson from './templates/entity-extract-json';
import * as relationExtractJson from './templates/relation-extract-json';

/**
 * Prompt template definition.
 */
export interface PromptTemplate {
	/** Template text with {{variable}} placeholders */
	template: string;
	/** System message sent alongside the rendered template */
	system?: string;
	/** Whether this prompt expects JSON output */
	expectsJson?: boolean;
	/** Additional instructions for JSON output (e.g., "Return only JSON array") */
	jsonConstraint?: string;
}

/**
 * Copy the known template fields out of a template module.
 */
function createTemplate(module: { template: string; system?: string; expectsJson?: boolean; jsonConstraint?: string }): PromptTemplate {
	return {
		template: module.template,
		system: module.system,
		expectsJson: module.expectsJson,
		jsonConstraint: module.jsonConstraint,
	};
}

/**
 * Identifiers of the prompts used by entity and relation extraction.
 */
export enum PromptId {
	EntityExtractJson = 'entity-extract-json',
	RelationExtractJson = 'relation-extract-json',
}

/**
 * Variables each prompt is rendered with.
 */
export interface PromptVariables {
	[PromptId.EntityExtractJson]: {
		text: string;
		entityTypes: Array<{ name: string; description: string }>;
	};
	[PromptId.RelationExtractJson]: {
		text: string;
		entities: Array<{ name: string; entityType: string }>;
	};
}

/**
 * Built-in templates, one module per prompt under templates/.
 */
export const PROMPT_REGISTRY: Record<PromptId, PromptTemplate> = {
	[PromptId.EntityExtractJson]: createTemplate(entityExtractJson),
	[PromptId.RelationExtractJson]: createTemplate(relationExtractJson),
};
