/**
 * Reports produced by the sync use cases. Built once per call, never stored.
 */

import type { AccessDenial } from './access-policy.js';
import type { FeatureType } from './feature-type.js';
import type { SubscriptionTier } from './subscription-tier.js';
import type { TierLimits } from './tier-limits.js';

export type SyncAction = 'created' | 'updated' | 'skipped' | 'denied';

export type SyncStatus = 'success' | 'partial' | 'skipped' | 'failed';

/**
 * Outcome for one template.
 */
export interface SyncedItem {
	readonly templateId: string;
	/** Id of the copy written by this call; empty when none */
	readonly copyId: string;
	readonly name: string;
	readonly version: string;
	readonly folder: string;
	readonly action: SyncAction;
	readonly denialReason: string | null;
}

export interface SyncTotals {
	readonly available: number;
	readonly accessible: number;
	/** created + up to date; forced rewrites are not counted */
	readonly synced: number;
}

export interface SyncResult {
	readonly userId: string;
	readonly syncedAt: Date;
	readonly status: SyncStatus;
	readonly message: string | null;
	readonly tier: SubscriptionTier;
	readonly enabledFeatures: readonly FeatureType[];
	readonly created: readonly SyncedItem[];
	readonly updated: readonly SyncedItem[];
	readonly upToDate: number;
	readonly denied: readonly SyncedItem[];
	/** Accessible templates whose copy failed; they appear in no list */
	readonly failed: number;
	readonly foldersCreated: readonly string[];
	readonly totals: SyncTotals;
}

/**
 * A template the user could unlock by moving to a higher tier.
 */
export interface UpgradeOpportunity {
	readonly templateId: string;
	readonly templateName: string;
	readonly requiredTier: SubscriptionTier;
	readonly requiredFeature: string | null;
	readonly features: readonly string[];
	readonly reason: string;
}

export interface SyncStatusSnapshot {
	readonly userId: string;
	readonly tier: SubscriptionTier;
	readonly enabledFeatures: readonly FeatureType[];
	readonly tierLimits: TierLimits;
	readonly isActive: boolean;
	readonly lastSyncAt: Date | null;
	readonly totalFlows: number;
	readonly templateFlows: number;
	readonly customFlows: number;
	readonly availableTemplates: number;
	readonly accessibleTemplates: number;
	readonly pendingUpdates: number;
	readonly deniedTemplates: number;
	readonly upgradeOpportunities: readonly UpgradeOpportunity[];
}

export interface AccessVerdict {
	readonly hasAccess: boolean;
	readonly templateId: string;
	readonly templateName: string;
	readonly reason: string | null;
	readonly denialKind: AccessDenial['kind'] | null;
	readonly requiredTier: SubscriptionTier | null;
	readonly requiredFeature: string | null;
	readonly upgradeUrl: string | null;
}

/**
 * Enabled features in declaration order, for stable reports.
 */
export function sortedFeatures(features: ReadonlySet<FeatureType>, order: readonly FeatureType[]): FeatureType[] {
	return order.filter((feature) => features.has(feature));
}
