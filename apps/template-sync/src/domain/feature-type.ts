/**
 * Gated capability ("walker agent") a template may require.
 */
export const FeatureType = {
	SEO: 'seo',
	CONTENT: 'content',
	PAID_ADS: 'paid_ads',
	AUDIENCE_INTELLIGENCE: 'audience_intelligence',
} as const;

export type FeatureType = (typeof FeatureType)[keyof typeof FeatureType];

export const ALL_FEATURE_TYPES: readonly FeatureType[] = [
	FeatureType.SEO,
	FeatureType.CONTENT,
	FeatureType.PAID_ADS,
	FeatureType.AUDIENCE_INTELLIGENCE,
];

/**
 * Resolve a stored feature string. Returns undefined for unknown values.
 */
export function parseFeatureType(raw: string | null | undefined): FeatureType | undefined {
	if (typeof raw !== 'string') return undefined;
	const normalized = raw.trim().toLowerCase();
	return ALL_FEATURE_TYPES.find((feature) => feature === normalized);
}
