import Handlebars from 'handlebars';

let registered = false;

export function registerTemplateEngineHelpers() {
	if (registered) return;
	registered = true;
	// 1-based numbering inside {{#each}}
	Handlebars.registerHelper('inc', function (value: unknown) {
		return Number(value) + 1;
	});
}
