import { generateRecordId, isValidRecordId } from './id_generator';

describe('ID Generators', () => {
  it('should generate distinct UUID v4 identifiers', () => {
    const first = generateRecordId();
    const second = generateRecordId();

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(first).not.toBe(second);
  });

  it('should validate record id format', () => {
    expect(isValidRecordId(generateRecordId())).toBe(true);
    expect(isValidRecordId('123e4567-e89b-42d3-a456-426614174000')).toBe(true);
    expect(isValidRecordId('task-1')).toBe(false);
    expect(isValidRecordId(42)).toBe(false);
  });
});
