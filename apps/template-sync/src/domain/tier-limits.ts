import type { SubscriptionTier } from './subscription-tier.js';

/**
 * Resource quotas attached to a tier. Reported to callers, not enforced when
 * deciding template access.
 */
export interface TierLimits {
	readonly maxFlows: number;
	readonly maxWalkerAgents: number;
	readonly maxCampaigns: number;
	readonly apiRateLimit: number;
}

const TIER_LIMITS: Record<SubscriptionTier, TierLimits> = {
	starter: { maxFlows: 5, maxWalkerAgents: 0, maxCampaigns: 1, apiRateLimit: 100 },
	professional: { maxFlows: 50, maxWalkerAgents: 2, maxCampaigns: 10, apiRateLimit: 1000 },
	business: { maxFlows: 200, maxWalkerAgents: 4, maxCampaigns: 100, apiRateLimit: 10000 },
	enterprise: { maxFlows: 1000, maxWalkerAgents: 4, maxCampaigns: 1000, apiRateLimit: 50000 },
};

export function tierLimits(tier: SubscriptionTier): TierLimits {
	return TIER_LIMITS[tier];
}
