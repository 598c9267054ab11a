// ---------------------------------------------------------------------------
// ExternalIssueRequest → Jira create-issue payload
// ---------------------------------------------------------------------------

import type { ExternalIssueRequest } from "@tracklink/core";
import type { AdfDocument, AdfNode, JiraCreateIssuePayload } from "./types";

/**
 * Convert plain text into an ADF document.
 *
 * Blank lines separate paragraphs; single line breaks become `hardBreak`
 * nodes. Returns `null` for empty or whitespace-only text.
 */
export function textToAdf(text: string): AdfDocument | null {
	const paragraphs = text
		.replace(/\r\n/g, "\n")
		.split(/\n\s*\n/)
		.map((p) => p.trim())
		.filter((p) => p.length > 0);
	if (paragraphs.length === 0) return null;

	const content: AdfNode[] = paragraphs.map((paragraph) => {
		const nodes: AdfNode[] = [];
		paragraph.split("\n").forEach((line, i) => {
			if (i > 0) nodes.push({ type: "hardBreak" });
			if (line.length > 0) nodes.push({ type: "text", text: line });
		});
		return { type: "paragraph", content: nodes };
	});

	return { type: "doc", version: 1, content };
}

/**
 * Build the JSON body for `POST /rest/api/3/issue`.
 *
 * Extra fields go in first so the required fields can never be overwritten
 * by them.
 */
export function buildCreateIssuePayload(request: ExternalIssueRequest): JiraCreateIssuePayload {
	const fields: Record<string, unknown> = { ...request.extraFields };
	fields.project = { key: request.projectKey };
	fields.issuetype = { name: request.issueType };
	fields.summary = request.summary;

	const description = request.description ? textToAdf(request.description) : null;
	if (description) {
		fields.description = description;
	}

	return { fields };
}
