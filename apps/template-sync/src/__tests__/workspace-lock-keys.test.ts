import { describe, it, expect } from 'vitest';

import { folderLockKey, templateCopyLockKey } from '../infrastructure/persistence/index.js';

describe('workspace lock keys', () => {
	it('should key folders by owner, parent and name', () => {
		expect(folderLockKey('ws-1', 'En Garde', null)).toBe('folder:ws-1:-:En Garde');
		expect(folderLockKey('ws-1', 'En Garde', 'parent-9')).toBe('folder:ws-1:parent-9:En Garde');
	});

	it('should key template copies by owner and template name', () => {
		expect(templateCopyLockKey('ws-1', 'Keyword Report')).toBe('template-copy:ws-1:Keyword Report');
		expect(templateCopyLockKey('ws-2', 'Keyword Report')).not.toBe(templateCopyLockKey('ws-1', 'Keyword Report'));
	});
});
