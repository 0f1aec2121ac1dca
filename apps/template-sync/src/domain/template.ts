import type { FeatureType } from './feature-type.js';
import type { SubscriptionTier } from './subscription-tier.js';

/**
 * Who may receive a template. Decided once when the catalog is read.
 *
 * - `free-tier`: everyone
 * - `gated`: tier floor plus an optional feature; `unrecognizedFeature` holds
 *   a stored feature name that matched no known feature
 * - `unknown`: stored category string that is neither of the above; never granted
 */
export type TemplateAccess =
	| { readonly kind: 'free-tier' }
	| {
			readonly kind: 'gated';
			readonly requiredTier: SubscriptionTier;
			readonly requiredFeature: FeatureType | null;
			readonly unrecognizedFeature?: string;
	  }
	| { readonly kind: 'unknown'; readonly category: string };

/**
 * Category strings as stored in the sidecar metadata block.
 */
export const TemplateCategory = {
	FREE_TIER: 'engarde_flows',
	GATED: 'walker_agents',
} as const;

export type TemplateCategory = (typeof TemplateCategory)[keyof typeof TemplateCategory];

export const DEFAULT_TEMPLATE_VERSION = '1.0.0';

export interface TemplateMetadata {
	readonly access: TemplateAccess;
	/** Stored category string, kept for reporting */
	readonly category: string;
	readonly features: readonly string[];
	readonly version: string;
}

/**
 * An admin-owned workflow definition eligible for copying into workspaces.
 */
export interface Template {
	readonly id: string;
	readonly name: string;
	/** Workflow payload, copied verbatim */
	readonly data: unknown;
	/** Raw description, including any metadata block */
	readonly description: string | null;
	readonly folderName: string | null;
	readonly updatedAt: Date | null;
	readonly metadata: TemplateMetadata;
}

/**
 * Feature a template asks for, as stored (recognised or not).
 */
export function templateRequiredFeature(access: TemplateAccess): string | null {
	if (access.kind !== 'gated') return null;
	return access.requiredFeature ?? access.unrecognizedFeature ?? null;
}
