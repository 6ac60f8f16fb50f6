/**
 * Record identity tests
 */

import { computeId, extractTimestamp, fieldTimestamp, RecordStamper } from './identity';
import { MalformedRecordError } from './errors';
import type { RawRecord } from './schemas';

function createQuestion(overrides: RawRecord = {}): RawRecord {
  return {
    question_id: 1001,
    title: 'How do I parse a date?',
    last_activity_date: 1459208694,
    ...overrides
  };
}

function createStamper(origin = 'stackoverflow') {
  return new RecordStamper(
    {
      origin,
      backendName: 'StackExchange',
      backendVersion: '0.1.0',
      discriminator: (record: RawRecord) => [String(record.question_id)],
      updatedAt: fieldTimestamp('last_activity_date')
    },
    () => 1500000000
  );
}

describe('computeId', () => {
  it('should be deterministic', () => {
    const a = computeId('stackoverflow', 'StackExchange', '0.1.0', 1001);
    const b = computeId('stackoverflow', 'StackExchange', '0.1.0', 1001);

    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should treat numbers and their string form alike', () => {
    expect(computeId('o', 'n', 'v', 7)).toBe(computeId('o', 'n', 'v', '7'));
  });

  it('should keep component boundaries unambiguous', () => {
    expect(computeId('a:b', 'c', 'd')).not.toBe(computeId('a', 'b:c', 'd'));
    expect(computeId('ab', 'c', 'd')).not.toBe(computeId('a', 'bc', 'd'));
  });

  it('should differ across origins', () => {
    expect(computeId('stackoverflow', 'StackExchange', '0.1.0', 1001))
      .not.toBe(computeId('askubuntu', 'StackExchange', '0.1.0', 1001));
  });

  it('should reject empty components', () => {
    expect(() => computeId('', 'StackExchange', '0.1.0')).toThrow(TypeError);
  });

  it('should reject non-finite numbers', () => {
    expect(() => computeId('o', 'n', 'v', Number.NaN)).toThrow('identifier component 3 is not a finite number');
  });
});

describe('extractTimestamp', () => {
  const record = createQuestion();

  it('should accept epoch seconds', () => {
    expect(extractTimestamp(record, () => 1459208694)).toBe(1459208694);
  });

  it('should accept numeric strings', () => {
    expect(extractTimestamp(record, () => '1470075075')).toBe(1470075075);
  });

  it('should accept ISO dates', () => {
    expect(extractTimestamp(record, () => '2016-01-01T00:00:00Z')).toBe(1451606400);
  });

  it('should accept Date objects', () => {
    expect(extractTimestamp(record, () => new Date(Date.UTC(2016, 0, 1)))).toBe(1451606400);
  });

  it('should fail when the timestamp is missing', () => {
    expect(() => extractTimestamp(record, () => undefined)).toThrow(MalformedRecordError);
  });

  it('should fail on unparsable strings', () => {
    expect(() => extractTimestamp(record, () => 'yesterday-ish')).toThrow(
      "record update timestamp is not a valid date: 'yesterday-ish'"
    );
  });

  it('should name the missing field', () => {
    let caught: unknown;
    try {
      extractTimestamp(createQuestion({ last_activity_date: null }), fieldTimestamp('last_activity_date'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedRecordError);
    expect(caught).toMatchObject({ field: 'last_activity_date', message: "record is missing 'last_activity_date'" });
  });
});

describe('RecordStamper', () => {
  it('should stamp the same record identically twice', () => {
    const stamper = createStamper();
    const first = stamper.stamp(createQuestion());
    const second = stamper.stamp(createQuestion());

    expect(second.uuid).toBe(first.uuid);
    expect(second.updated_on).toBe(first.updated_on);
  });

  it('should fill every stamped field', () => {
    const question = createQuestion();
    const stamped = createStamper().stamp(question);

    expect(stamped).toEqual({
      backend_name: 'StackExchange',
      backend_version: '0.1.0',
      origin: 'stackoverflow',
      uuid: computeId('stackoverflow', 'StackExchange', '0.1.0', '1001'),
      updated_on: 1459208694,
      fetched_on: 1500000000,
      data: question
    });
  });

  it('should ignore fields outside the discriminator', () => {
    const stamper = createStamper();

    expect(stamper.stamp(createQuestion({ title: 'edited' })).uuid)
      .toBe(stamper.stamp(createQuestion()).uuid);
  });

  it('should not collide across origins', () => {
    expect(createStamper('askubuntu').stamp(createQuestion()).uuid)
      .not.toBe(createStamper('stackoverflow').stamp(createQuestion()).uuid);
  });
});
