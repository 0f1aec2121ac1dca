import { describe, it, expect } from 'vitest';

import {
	DEFAULT_TEMPLATE_METADATA,
	cleanDescription,
	parseTemplateMetadata,
} from '../infrastructure/catalog/template-metadata.js';
import { metadataDescription } from './support/in-memory.js';

describe('parseTemplateMetadata', () => {
	it('should default to free tier for missing or plain-text descriptions', () => {
		expect(parseTemplateMetadata(null)).toEqual(DEFAULT_TEMPLATE_METADATA);
		expect(parseTemplateMetadata('')).toEqual(DEFAULT_TEMPLATE_METADATA);
		expect(parseTemplateMetadata('Weekly keyword report')).toEqual(DEFAULT_TEMPLATE_METADATA);
	});

	it('should default when the JSON carries no metadata block', () => {
		expect(parseTemplateMetadata('{"user_description":"hi"}')).toEqual(DEFAULT_TEMPLATE_METADATA);
		expect(parseTemplateMetadata('[1, 2]')).toEqual(DEFAULT_TEMPLATE_METADATA);
		expect(parseTemplateMetadata('{"template_metadata": "oops"}')).toEqual(DEFAULT_TEMPLATE_METADATA);
	});

	it('should read a gated block', () => {
		const description = metadataDescription({
			required_tier: 'professional',
			walker_agent_type: 'seo',
			category: 'walker_agents',
			features: ['keyword_research'],
			version: '1.2.0',
		});

		expect(parseTemplateMetadata(description)).toEqual({
			access: { kind: 'gated', requiredTier: 'professional', requiredFeature: 'seo' },
			category: 'walker_agents',
			features: ['keyword_research'],
			version: '1.2.0',
		});
	});

	it('should map legacy tier names and default a missing tier to the lowest', () => {
		const legacy = parseTemplateMetadata(metadataDescription({ required_tier: 'agency', category: 'walker_agents' }));
		expect(legacy.access).toEqual({ kind: 'gated', requiredTier: 'enterprise', requiredFeature: null });

		const missing = parseTemplateMetadata(metadataDescription({ category: 'walker_agents', walker_agent_type: 'content' }));
		expect(missing.access).toEqual({ kind: 'gated', requiredTier: 'starter', requiredFeature: 'content' });
	});

	it('should keep an unrecognised walker agent for denial', () => {
		const metadata = parseTemplateMetadata(
			metadataDescription({ required_tier: 'business', walker_agent_type: 'crm', category: 'walker_agents' }),
		);
		expect(metadata.access).toEqual({
			kind: 'gated',
			requiredTier: 'business',
			requiredFeature: null,
			unrecognizedFeature: 'crm',
		});
	});

	it('should treat other categories as unknown', () => {
		const metadata = parseTemplateMetadata(metadataDescription({ category: 'partner_only' }));
		expect(metadata.access).toEqual({ kind: 'unknown', category: 'partner_only' });
		expect(metadata.category).toBe('partner_only');
	});

	it('should default malformed fields individually', () => {
		const metadata = parseTemplateMetadata(
			metadataDescription({ category: 'engarde_flows', features: 'seo', version: 3 }),
		);
		expect(metadata).toEqual({
			access: { kind: 'free-tier' },
			category: 'engarde_flows',
			features: [],
			version: '1.0.0',
		});
	});
});

describe('cleanDescription', () => {
	it('should return the user description from a metadata block', () => {
		expect(cleanDescription(metadataDescription({ category: 'engarde_flows' }, 'Weekly report'))).toBe('Weekly report');
	});

	it('should return plain text unchanged', () => {
		expect(cleanDescription('Just text')).toBe('Just text');
		expect(cleanDescription('{"template_metadata":{}}')).toBe('{"template_metadata":{}}');
	});

	it('should return an empty string for no description', () => {
		expect(cleanDescription(null)).toBe('');
	});
});
