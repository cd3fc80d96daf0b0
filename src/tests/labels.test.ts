import { describe, expect, it } from 'vitest';
import { columnLabel, prettyColumnLabel } from '../lib/labels';

describe('prettyColumnLabel', () => {
  it('title-cases keys and keeps acronyms', () => {
    expect(prettyColumnLabel('medication_fixed')).toBe('Medication Fixed');
    expect(prettyColumnLabel('unique_id')).toBe('Unique ID');
    expect(prettyColumnLabel('doseMg')).toBe('Dose Mg');
  });
});

describe('columnLabel', () => {
  it('prefers an explicit label', () => {
    expect(columnLabel({ key: 'dose', kind: 'number', label: 'Dose (mg)' })).toBe('Dose (mg)');
    expect(columnLabel({ key: 'dose', kind: 'number' })).toBe('Dose');
  });
});
