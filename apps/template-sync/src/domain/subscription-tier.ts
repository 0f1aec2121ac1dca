/**
 * Subscription tier of an account.
 *
 * Tiers are compared by rank, never by declaration order or string value.
 * Names used by older account records are mapped onto the canonical tiers by
 * {@link parseSubscriptionTier} at the boundary; policy code only ever sees
 * canonical values.
 */
export const SubscriptionTier = {
	STARTER: 'starter',
	PROFESSIONAL: 'professional',
	BUSINESS: 'business',
	ENTERPRISE: 'enterprise',
} as const;

export type SubscriptionTier = (typeof SubscriptionTier)[keyof typeof SubscriptionTier];

const TIER_RANK: Record<SubscriptionTier, number> = {
	starter: 0,
	professional: 1,
	business: 2,
	enterprise: 3,
};

/**
 * Legacy tier names still stored by the account system.
 */
const TIER_ALIASES: Readonly<Record<string, SubscriptionTier>> = {
	free: SubscriptionTier.STARTER,
	pro: SubscriptionTier.PROFESSIONAL,
	agency: SubscriptionTier.ENTERPRISE,
};

/** Every canonical tier, lowest rank first. */
export const ALL_SUBSCRIPTION_TIERS: readonly SubscriptionTier[] = [
	SubscriptionTier.STARTER,
	SubscriptionTier.PROFESSIONAL,
	SubscriptionTier.BUSINESS,
	SubscriptionTier.ENTERPRISE,
];

export const LOWEST_TIER: SubscriptionTier = SubscriptionTier.STARTER;

function isSubscriptionTier(value: string): value is SubscriptionTier {
	return Object.hasOwn(TIER_RANK, value);
}

/**
 * Resolve a stored tier string (canonical or legacy, any case) to a canonical
 * tier. Returns undefined when the string names no tier.
 */
export function resolveSubscriptionTier(raw: string | null | undefined): SubscriptionTier | undefined {
	if (typeof raw !== 'string') return undefined;
	const normalized = raw.trim().toLowerCase();
	if (isSubscriptionTier(normalized)) return normalized;
	return Object.hasOwn(TIER_ALIASES, normalized) ? TIER_ALIASES[normalized] : undefined;
}

/**
 * Resolve a stored tier string, falling back to the lowest tier for anything
 * unrecognised.
 */
export function parseSubscriptionTier(raw: string | null | undefined): SubscriptionTier {
	return resolveSubscriptionTier(raw) ?? LOWEST_TIER;
}

export function tierRank(tier: SubscriptionTier): number {
	return TIER_RANK[tier];
}

/**
 * True when `userTier` ranks at or above `requiredTier`.
 */
export function atLeast(userTier: SubscriptionTier, requiredTier: SubscriptionTier): boolean {
	return tierRank(userTier) >= tierRank(requiredTier);
}
