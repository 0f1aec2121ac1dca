/**
 * Domain Layer
 */

export {
	SubscriptionTier,
	ALL_SUBSCRIPTION_TIERS,
	LOWEST_TIER,
	resolveSubscriptionTier,
	parseSubscriptionTier,
	tierRank,
	atLeast,
} from './subscription-tier.js';

export { FeatureType, ALL_FEATURE_TYPES, parseFeatureType } from './feature-type.js';

export { type TierLimits, tierLimits } from './tier-limits.js';

export {
	type TemplateAccess,
	type TemplateMetadata,
	type Template,
	TemplateCategory,
	DEFAULT_TEMPLATE_VERSION,
	templateRequiredFeature,
} from './template.js';

export { type UserEntitlement, type WorkspaceUser } from './entitlement.js';

export { type WorkspaceFolder, type FolderRef, type WorkspaceFlow } from './workspace.js';

export {
	allowedFeatures,
	hasFeatureAccess,
	decideTemplateAccess,
	deniedFeature,
	deniedRequiredTier,
	type AccessDenial,
	type AccessDecision,
	type AccessSubject,
} from './access-policy.js';

export {
	type SyncAction,
	type SyncStatus,
	type SyncedItem,
	type SyncTotals,
	type SyncResult,
	type UpgradeOpportunity,
	type SyncStatusSnapshot,
	type AccessVerdict,
	sortedFeatures,
} from './sync-result.js';
