/**
 * Splits a catalog into the templates a user may receive and the ones they
 * may not, with the denial for each.
 */

import { decideTemplateAccess, type AccessDenial, type AccessSubject, type Template } from '../../domain/index.js';

export interface DeniedTemplate {
	readonly template: Template;
	readonly denial: AccessDenial;
}

export interface AccessPartition {
	readonly accessible: Template[];
	readonly denied: DeniedTemplate[];
}

export function partitionByAccess(templates: readonly Template[], subject: AccessSubject): AccessPartition {
	const accessible: Template[] = [];
	const denied: DeniedTemplate[] = [];

	for (const template of templates) {
		const decision = decideTemplateAccess(template.metadata.access, subject);
		if (decision.granted) {
			accessible.push(template);
		} else {
			denied.push({ template, denial: decision.denial });
		}
	}

	return { accessible, denied };
}
