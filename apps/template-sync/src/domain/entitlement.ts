import type { FeatureType } from './feature-type.js';
import type { SubscriptionTier } from './subscription-tier.js';
import type { TierLimits } from './tier-limits.js';

/**
 * A user's resolved access rights, read from the account store for the
 * duration of one operation.
 */
export interface UserEntitlement {
	readonly userId: string;
	/** Email used to find the same person in the workspace store */
	readonly accountHandle: string | null;
	readonly tier: SubscriptionTier;
	readonly enabledFeatures: ReadonlySet<FeatureType>;
	readonly tierLimits: TierLimits;
	/** Reported only; an inactive account still syncs */
	readonly isActive: boolean;
	readonly tenantId: string | null;
}

/**
 * The same person's account in the workspace store.
 */
export interface WorkspaceUser {
	readonly id: string;
	readonly username: string;
	readonly isActive: boolean;
}
