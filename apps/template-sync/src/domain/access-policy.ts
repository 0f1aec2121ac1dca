/**
 * Tier/Entitlement Policy
 *
 * Pure functions deciding whether an entitlement grants a template. No I/O.
 */

import { FeatureType } from './feature-type.js';
import { atLeast, type SubscriptionTier } from './subscription-tier.js';
import type { TemplateAccess } from './template.js';

const ALLOWED_FEATURES: Record<SubscriptionTier, ReadonlySet<FeatureType>> = {
	starter: new Set<FeatureType>([FeatureType.SEO, FeatureType.CONTENT]),
	// Professional allows paid ads only; it is not a superset of starter.
	professional: new Set<FeatureType>([FeatureType.PAID_ADS]),
	business: new Set<FeatureType>([FeatureType.SEO, FeatureType.CONTENT, FeatureType.PAID_ADS, FeatureType.AUDIENCE_INTELLIGENCE]),
	enterprise: new Set<FeatureType>([FeatureType.SEO, FeatureType.CONTENT, FeatureType.PAID_ADS, FeatureType.AUDIENCE_INTELLIGENCE]),
};

/**
 * Features a tier permits a user to enable.
 */
export function allowedFeatures(tier: SubscriptionTier): ReadonlySet<FeatureType> {
	return ALLOWED_FEATURES[tier];
}

/**
 * True when no feature is required, or the tier allows the feature and the
 * user has enabled it.
 */
export function hasFeatureAccess(
	tier: SubscriptionTier,
	enabledFeatures: ReadonlySet<FeatureType>,
	requiredFeature: FeatureType | null,
): boolean {
	if (requiredFeature === null) return true;
	return allowedFeatures(tier).has(requiredFeature) && enabledFeatures.has(requiredFeature);
}

export type AccessDenial =
	| {
			readonly kind: 'tier_too_low';
			readonly reason: string;
			readonly requiredTier: SubscriptionTier;
			readonly currentTier: SubscriptionTier;
	  }
	| {
			readonly kind: 'feature_not_allowed';
			readonly reason: string;
			readonly requiredTier: SubscriptionTier;
			readonly feature: string;
	  }
	| {
			readonly kind: 'feature_not_enabled';
			readonly reason: string;
			readonly requiredTier: SubscriptionTier;
			readonly feature: FeatureType;
	  }
	| { readonly kind: 'unknown_category'; readonly reason: string; readonly category: string };

export type AccessDecision = { readonly granted: true } | { readonly granted: false; readonly denial: AccessDenial };

/** The parts of an entitlement the decision reads. */
export interface AccessSubject {
	readonly tier: SubscriptionTier;
	readonly enabledFeatures: ReadonlySet<FeatureType>;
}

const GRANTED: AccessDecision = { granted: true };

function formatAllowance(tier: SubscriptionTier): string {
	return `[${[...allowedFeatures(tier)].join(', ')}]`;
}

/**
 * Decide whether `subject` may receive a template with the given access rule.
 *
 * The tier floor is checked before the feature, so a tier that is too low is
 * always reported as such even when the feature is also missing.
 */
export function decideTemplateAccess(access: TemplateAccess, subject: AccessSubject): AccessDecision {
	switch (access.kind) {
		case 'free-tier':
			return GRANTED;

		case 'unknown':
			return {
				granted: false,
				denial: {
					kind: 'unknown_category',
					reason: `Unknown template category: ${access.category}`,
					category: access.category,
				},
			};

		case 'gated': {
			if (!atLeast(subject.tier, access.requiredTier)) {
				return {
					granted: false,
					denial: {
						kind: 'tier_too_low',
						reason: `Requires ${access.requiredTier} tier or higher (current: ${subject.tier})`,
						requiredTier: access.requiredTier,
						currentTier: subject.tier,
					},
				};
			}

			if (access.unrecognizedFeature !== undefined) {
				return {
					granted: false,
					denial: {
						kind: 'feature_not_allowed',
						reason: `Walker agent '${access.unrecognizedFeature}' not accessible. Tier ${subject.tier} allows: ${formatAllowance(subject.tier)}`,
						requiredTier: access.requiredTier,
						feature: access.unrecognizedFeature,
					},
				};
			}

			const feature = access.requiredFeature;
			if (feature === null || hasFeatureAccess(subject.tier, subject.enabledFeatures, feature)) {
				return GRANTED;
			}

			if (!allowedFeatures(subject.tier).has(feature)) {
				return {
					granted: false,
					denial: {
						kind: 'feature_not_allowed',
						reason: `Walker agent '${feature}' not accessible. Tier ${subject.tier} allows: ${formatAllowance(subject.tier)}`,
						requiredTier: access.requiredTier,
						feature,
					},
				};
			}

			return {
				granted: false,
				denial: {
					kind: 'feature_not_enabled',
					reason: `Walker agent '${feature}' not accessible. It is not enabled for this account`,
					requiredTier: access.requiredTier,
					feature,
				},
			};
		}
	}
}

/**
 * Feature named by a denial, if any.
 */
export function deniedFeature(denial: AccessDenial): string | null {
	return denial.kind === 'feature_not_allowed' || denial.kind === 'feature_not_enabled' ? denial.feature : null;
}

/**
 * Tier named by a denial, if any.
 */
export function deniedRequiredTier(denial: AccessDenial): SubscriptionTier | null {
	return denial.kind === 'unknown_category' ? null : denial.requiredTier;
}
