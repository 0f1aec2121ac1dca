/**
 * Template Metadata
 *
 * Access metadata travels inside a template's description as a JSON block:
 *
 * ```json
 * {
 *     "user_description": "Weekly keyword report",
 *     "template_metadata": {
 *         "required_tier": "professional",
 *         "walker_agent_type": "seo",
 *         "category": "walker_agents",
 *         "features": ["keyword_research"],
 *         "version": "1.2.0"
 *     }
 * }
 * ```
 *
 * Parsing never fails: a plain-text description, a malformed block or a
 * malformed field yields the defaults for that part. Only this module knows
 * the layout, so the policy and use cases work with {@link TemplateMetadata}.
 */

import { z } from 'zod/v4';
import {
	DEFAULT_TEMPLATE_VERSION,
	LOWEST_TIER,
	TemplateCategory,
	parseFeatureType,
	parseSubscriptionTier,
	type TemplateAccess,
	type TemplateMetadata,
} from '../../domain/index.js';

const MetadataBlockSchema = z.object({
	required_tier: z.string().nullable().catch(null),
	walker_agent_type: z.string().nullable().catch(null),
	category: z.string().catch(TemplateCategory.FREE_TIER),
	features: z.array(z.string()).catch([]),
	version: z.string().min(1).catch(DEFAULT_TEMPLATE_VERSION),
});

const DescriptionEnvelopeSchema = z.object({
	user_description: z.string().optional().catch(undefined),
	template_metadata: z.unknown(),
});

type MetadataBlock = z.infer<typeof MetadataBlockSchema>;

export const DEFAULT_TEMPLATE_METADATA: TemplateMetadata = {
	access: { kind: 'free-tier' },
	category: TemplateCategory.FREE_TIER,
	features: [],
	version: DEFAULT_TEMPLATE_VERSION,
};

function parseJsonObject(text: string): Record<string, unknown> | undefined {
	let value: unknown;
	try {
		value = JSON.parse(text);
	} catch {
		return undefined;
	}
	if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
	return Object.fromEntries(Object.entries(value));
}

function toAccess(block: MetadataBlock): TemplateAccess {
	switch (block.category) {
		case TemplateCategory.FREE_TIER:
			return { kind: 'free-tier' };
		case TemplateCategory.GATED: {
			const requiredTier = block.required_tier === null ? LOWEST_TIER : parseSubscriptionTier(block.required_tier);
			const rawFeature = block.walker_agent_type?.trim() ?? '';
			if (rawFeature === '') {
				return { kind: 'gated', requiredTier, requiredFeature: null };
			}
			const requiredFeature = parseFeatureType(rawFeature);
			if (requiredFeature === undefined) {
				return { kind: 'gated', requiredTier, requiredFeature: null, unrecognizedFeature: rawFeature };
			}
			return { kind: 'gated', requiredTier, requiredFeature };
		}
		default:
			return { kind: 'unknown', category: block.category };
	}
}

/**
 * Read the access metadata embedded in a template description.
 */
export function parseTemplateMetadata(description: string | null | undefined): TemplateMetadata {
	if (!description) return DEFAULT_TEMPLATE_METADATA;

	const envelope = parseJsonObject(description);
	if (!envelope || !('template_metadata' in envelope)) return DEFAULT_TEMPLATE_METADATA;

	const block = MetadataBlockSchema.safeParse(envelope['template_metadata']);
	if (!block.success) return DEFAULT_TEMPLATE_METADATA;

	return {
		access: toAccess(block.data),
		category: block.data.category,
		features: block.data.features,
		version: block.data.version,
	};
}

/**
 * The user-facing part of a description: `user_description` when the
 * description is a structured block, the text itself otherwise.
 */
export function cleanDescription(description: string | null | undefined): string {
	if (!description) return '';

	const envelope = parseJsonObject(description);
	if (!envelope) return description;

	const parsed = DescriptionEnvelopeSchema.safeParse(envelope);
	if (parsed.success && parsed.data.user_description !== undefined) {
		return parsed.data.user_description;
	}
	return description;
}
