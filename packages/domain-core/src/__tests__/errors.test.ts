import { describe, it, expect } from 'vitest';
import { UseCaseError } from '../errors.js';

describe('UseCaseError', () => {
	it('should create a not found error with default details', () => {
		const error = UseCaseError.notFound('ENTITLEMENT_NOT_FOUND', 'User not found');

		expect(error).toEqual({
			type: 'not_found',
			code: 'ENTITLEMENT_NOT_FOUND',
			message: 'User not found',
			details: {},
		});
	});

	it('should keep the details it is given', () => {
		const error = UseCaseError.notFound('ENTITLEMENT_NOT_FOUND', 'User not found', { userId: 'u-1' });
		expect(error.details).toEqual({ userId: 'u-1' });
	});

	describe('httpStatus', () => {
		it('should map not found to 404', () => {
			expect(UseCaseError.httpStatus(UseCaseError.notFound('B', 'b'))).toBe(404);
		});
	});
});
