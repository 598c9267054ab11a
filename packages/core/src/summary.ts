/** Values substituted into a summary template. */
export interface SummaryVariables {
	id: string;
	title: string;
	project: string;
}

/** Jira rejects summaries longer than this. */
export const MAX_SUMMARY_LENGTH = 255;

const PLACEHOLDER = /\{(id|title|project)\}/g;

/** Whether the template references at least one known placeholder. */
export function hasPlaceholder(template: string): boolean {
	return new RegExp(PLACEHOLDER.source).test(template);
}

/**
 * Render a summary template such as `"[#{id}] {title}"`.
 *
 * Unknown `{...}` sequences are left untouched. Line breaks collapse to a
 * single space, since the summary is a single-line field, and the result is
 * cut to {@link MAX_SUMMARY_LENGTH} characters.
 */
export function renderSummary(template: string, vars: SummaryVariables): string {
	const rendered = template
		.replace(PLACEHOLDER, (_match, name: keyof SummaryVariables) => vars[name])
		.replace(/\s*[\r\n]+\s*/g, " ")
		.trim();
	return rendered.length > MAX_SUMMARY_LENGTH ? rendered.slice(0, MAX_SUMMARY_LENGTH) : rendered;
}
