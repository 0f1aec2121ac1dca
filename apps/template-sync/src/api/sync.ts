/**
 * Template Sync API
 *
 * Endpoints called by the account backend to sync templates into a user's
 * workspace and to inspect access. Responses use snake_case field names, the
 * wire format the calling backend expects.
 */

import type { FastifyInstance } from 'fastify';
import { Type, type Static } from '@sinclair/typebox';
import { sendResult, errorResponses } from '@template-sync/http';
import type { UseCase } from '@template-sync/application';

import type {
	CheckTemplateAccessCommand,
	GetSyncStatusCommand,
	SyncUserTemplatesCommand,
} from '../application/index.js';
import type {
	AccessVerdict,
	SyncedItem,
	SyncResult,
	SyncStatusSnapshot,
	UpgradeOpportunity,
} from '../domain/index.js';

// ─── Request Schemas ────────────────────────────────────────────────────────

const UserIdParam = Type.Object({ userId: Type.String({ minLength: 1 }) });

const CheckAccessParams = Type.Object({
	userId: Type.String({ minLength: 1 }),
	templateId: Type.String({ minLength: 1 }),
});

const SyncQuerySchema = Type.Object({
	force_sync: Type.Optional(Type.Boolean({ default: false })),
});

type UserIdParams = Static<typeof UserIdParam>;
type CheckAccessParamsType = Static<typeof CheckAccessParams>;
type SyncQuery = Static<typeof SyncQuerySchema>;

// ─── Response Schemas ───────────────────────────────────────────────────────

const NullableString = Type.Union([Type.String(), Type.Null()]);

const SyncedItemSchema = Type.Object({
	flow_id: Type.String(),
	template_id: Type.String(),
	name: Type.String(),
	template_version: Type.String(),
	folder: Type.String(),
	action: Type.String(),
	denial_reason: NullableString,
});

const SyncResponseSchema = Type.Object({
	user_id: Type.String(),
	sync_timestamp: Type.String({ format: 'date-time' }),
	status: Type.String(),
	message: NullableString,
	new_flows_added: Type.Array(SyncedItemSchema),
	flows_updated: Type.Array(SyncedItemSchema),
	flows_up_to_date: Type.Integer(),
	flows_denied: Type.Array(SyncedItemSchema),
	flows_failed: Type.Integer(),
	total_templates_available: Type.Integer(),
	total_templates_accessible: Type.Integer(),
	total_templates_synced: Type.Integer(),
	subscription_tier: Type.String(),
	enabled_walker_agents: Type.Array(Type.String()),
	folders_created: Type.Array(Type.String()),
});

const TierLimitsSchema = Type.Object({
	max_flows: Type.Integer(),
	max_walker_agents: Type.Integer(),
	max_campaigns: Type.Integer(),
	api_rate_limit: Type.Integer(),
});

const UpgradeOpportunitySchema = Type.Object({
	template_id: Type.String(),
	template_name: Type.String(),
	required_tier: Type.String(),
	walker_agent_type: NullableString,
	features: Type.Array(Type.String()),
	reason: Type.String(),
});

const SyncStatusResponseSchema = Type.Object({
	user_id: Type.String(),
	subscription_tier: Type.String(),
	enabled_walker_agents: Type.Array(Type.String()),
	tier_limits: TierLimitsSchema,
	is_active: Type.Boolean(),
	last_sync_at: Type.Union([Type.String({ format: 'date-time' }), Type.Null()]),
	total_flows: Type.Integer(),
	template_flows_count: Type.Integer(),
	custom_flows_count: Type.Integer(),
	available_templates: Type.Integer(),
	accessible_templates: Type.Integer(),
	pending_updates: Type.Integer(),
	denied_templates: Type.Integer(),
	upgrade_opportunities: Type.Array(UpgradeOpportunitySchema),
});

const AccessVerdictResponseSchema = Type.Object({
	has_access: Type.Boolean(),
	template_id: Type.String(),
	template_name: Type.String(),
	reason: NullableString,
	denial_kind: NullableString,
	required_tier: NullableString,
	required_walker_agent: NullableString,
	upgrade_url: NullableString,
});

type SyncedItemResponse = Static<typeof SyncedItemSchema>;
type SyncResponse = Static<typeof SyncResponseSchema>;
type SyncStatusResponse = Static<typeof SyncStatusResponseSchema>;
type AccessVerdictResponse = Static<typeof AccessVerdictResponseSchema>;

// ─── Mappers ────────────────────────────────────────────────────────────────

function toSyncedItemResponse(item: SyncedItem): SyncedItemResponse {
	return {
		flow_id: item.copyId,
		template_id: item.templateId,
		name: item.name,
		template_version: item.version,
		folder: item.folder,
		action: item.action,
		denial_reason: item.denialReason,
	};
}

export function toSyncResponse(result: SyncResult): SyncResponse {
	return {
		user_id: result.userId,
		sync_timestamp: result.syncedAt.toISOString(),
		status: result.status,
		message: result.message,
		new_flows_added: result.created.map(toSyncedItemResponse),
		flows_updated: result.updated.map(toSyncedItemResponse),
		flows_up_to_date: result.upToDate,
		flows_denied: result.denied.map(toSyncedItemResponse),
		flows_failed: result.failed,
		total_templates_available: result.totals.available,
		total_templates_accessible: result.totals.accessible,
		total_templates_synced: result.totals.synced,
		subscription_tier: result.tier,
		enabled_walker_agents: [...result.enabledFeatures],
		folders_created: [...result.foldersCreated],
	};
}

function toUpgradeOpportunityResponse(opportunity: UpgradeOpportunity): SyncStatusResponse['upgrade_opportunities'][number] {
	return {
		template_id: opportunity.templateId,
		template_name: opportunity.templateName,
		required_tier: opportunity.requiredTier,
		walker_agent_type: opportunity.requiredFeature,
		features: [...opportunity.features],
		reason: opportunity.reason,
	};
}

export function toSyncStatusResponse(snapshot: SyncStatusSnapshot): SyncStatusResponse {
	return {
		user_id: snapshot.userId,
		subscription_tier: snapshot.tier,
		enabled_walker_agents: [...snapshot.enabledFeatures],
		tier_limits: {
			max_flows: snapshot.tierLimits.maxFlows,
			max_walker_agents: snapshot.tierLimits.maxWalkerAgents,
			max_campaigns: snapshot.tierLimits.maxCampaigns,
			api_rate_limit: snapshot.tierLimits.apiRateLimit,
		},
		is_active: snapshot.isActive,
		last_sync_at: snapshot.lastSyncAt ? snapshot.lastSyncAt.toISOString() : null,
		total_flows: snapshot.totalFlows,
		template_flows_count: snapshot.templateFlows,
		custom_flows_count: snapshot.customFlows,
		available_templates: snapshot.availableTemplates,
		accessible_templates: snapshot.accessibleTemplates,
		pending_updates: snapshot.pendingUpdates,
		denied_templates: snapshot.deniedTemplates,
		upgrade_opportunities: snapshot.upgradeOpportunities.map(toUpgradeOpportunityResponse),
	};
}

export function toAccessVerdictResponse(verdict: AccessVerdict): AccessVerdictResponse {
	return {
		has_access: verdict.hasAccess,
		template_id: verdict.templateId,
		template_name: verdict.templateName,
		reason: verdict.reason,
		denial_kind: verdict.denialKind,
		required_tier: verdict.requiredTier,
		required_walker_agent: verdict.requiredFeature,
		upgrade_url: verdict.upgradeUrl,
	};
}

// ─── Dependencies ───────────────────────────────────────────────────────────

export interface SyncRoutesDeps {
	readonly syncUserTemplatesUseCase: UseCase<SyncUserTemplatesCommand, SyncResult>;
	readonly getSyncStatusUseCase: UseCase<GetSyncStatusCommand, SyncStatusSnapshot>;
	readonly checkTemplateAccessUseCase: UseCase<CheckTemplateAccessCommand, AccessVerdict>;
}

// ─── Route Registration ─────────────────────────────────────────────────────

export async function registerSyncRoutes(fastify: FastifyInstance, deps: SyncRoutesDeps): Promise<void> {
	const { syncUserTemplatesUseCase, getSyncStatusUseCase, checkTemplateAccessUseCase } = deps;

	// POST /sync/:userId - Sync accessible templates into the user's workspace
	fastify.post<{ Params: UserIdParams; Querystring: SyncQuery }>(
		'/sync/:userId',
		{
			schema: {
				tags: ['Sync'],
				summary: 'Sync templates into a user workspace',
				params: UserIdParam,
				querystring: SyncQuerySchema,
				response: {
					200: SyncResponseSchema,
					...errorResponses(400, 401, 404, 500, 503),
				},
			},
		},
		async (request, reply) => {
			const command: SyncUserTemplatesCommand = {
				userId: request.params.userId,
				forceSync: request.query.force_sync ?? false,
			};
			const result = await syncUserTemplatesUseCase.execute(command);
			return sendResult(reply, result, { transform: toSyncResponse });
		},
	);

	// GET /sync/:userId/status - Read-only sync status
	fastify.get<{ Params: UserIdParams }>(
		'/sync/:userId/status',
		{
			schema: {
				tags: ['Sync'],
				summary: 'Get template sync status for a user',
				params: UserIdParam,
				response: {
					200: SyncStatusResponseSchema,
					...errorResponses(401, 404, 500, 503),
				},
			},
		},
		async (request, reply) => {
			const result = await getSyncStatusUseCase.execute({ userId: request.params.userId });
			return sendResult(reply, result, { transform: toSyncStatusResponse });
		},
	);

	// POST /sync/:userId/check-access/:templateId - Single template verdict
	fastify.post<{ Params: CheckAccessParamsType }>(
		'/sync/:userId/check-access/:templateId',
		{
			schema: {
				tags: ['Sync'],
				summary: 'Check whether a user may receive a template',
				params: CheckAccessParams,
				response: {
					200: AccessVerdictResponseSchema,
					...errorResponses(401, 404, 500, 503),
				},
			},
		},
		async (request, reply) => {
			const { userId, templateId } = request.params;
			const result = await checkTemplateAccessUseCase.execute({ userId, templateId });
			return sendResult(reply, result, { transform: toAccessVerdictResponse });
		},
	);
}
