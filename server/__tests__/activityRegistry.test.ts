/**
 * 活動レジストリ 単体テスト（signup / unregister / 定員）
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createActivityRegistry, MESSAGES, type ActivityRegistry } from '../registry/ActivityRegistry';
import { createMemoryStorage } from '../storage/MemoryStorage';

describe('activity registry', () => {
  let registry: ActivityRegistry;

  beforeEach(() => {
    registry = createActivityRegistry({ storage: createMemoryStorage() });
  });

  it('lists the seeded catalog', () => {
    const activities = registry.listActivities();
    expect(Object.keys(activities)).toEqual(['Chess Club', 'Programming Class', 'Gym Class']);
    expect(activities['Chess Club']).toEqual({
      description: 'Learn strategies and compete in chess tournaments',
      schedule: 'Fridays, 3:30 PM - 5:00 PM',
      max_participants: 12,
      participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
    });
  });

  it('returns identical listings when nothing changes in between', () => {
    expect(registry.listActivities()).toEqual(registry.listActivities());
  });

  it('does not leak listing mutations back into the registry', () => {
    const listed = registry.listActivities();
    listed['Chess Club'].participants.push('intruder@mergington.edu');
    delete listed['Gym Class'];

    const again = registry.listActivities();
    expect(again['Chess Club'].participants).toEqual(['michael@mergington.edu', 'daniel@mergington.edu']);
    expect(again['Gym Class']).toBeDefined();
  });

  it('signUp appends exactly one entry', () => {
    const result = registry.signUp('Chess Club', 'newstudent@mergington.edu');
    expect(result).toEqual({
      success: true,
      message: 'Signed up newstudent@mergington.edu for Chess Club',
    });

    const participants = registry.listActivities()['Chess Club'].participants;
    expect(participants).toEqual([
      'michael@mergington.edu',
      'daniel@mergington.edu',
      'newstudent@mergington.edu',
    ]);
  });

  it('signUp rejects a duplicate and leaves the roster unchanged', () => {
    registry.signUp('Chess Club', 'newstudent@mergington.edu');
    const result = registry.signUp('Chess Club', 'michael@mergington.edu');
    expect(result).toEqual({
      success: false,
      error: { code: 'conflict', message: MESSAGES.alreadySignedUp },
    });
    expect(registry.listActivities()['Chess Club'].participants).toHaveLength(3);
  });

  it('signUp and unregister reject an unknown activity without changing state', () => {
    const before = registry.listActivities();

    const signUp = registry.signUp('Underwater Basket Weaving', 'student@mergington.edu');
    const unregister = registry.unregister('Underwater Basket Weaving', 'student@mergington.edu');

    expect(signUp).toEqual({ success: false, error: { code: 'not_found', message: 'Activity not found' } });
    expect(unregister).toEqual({ success: false, error: { code: 'not_found', message: 'Activity not found' } });
    expect(registry.listActivities()).toEqual(before);
  });

  it('activity names are matched exactly', () => {
    const result = registry.signUp('chess club', 'student@mergington.edu');
    expect(result.success).toBe(false);
  });

  it('unregister removes exactly one entry', () => {
    const result = registry.unregister('Chess Club', 'michael@mergington.edu');
    expect(result).toEqual({
      success: true,
      message: 'Unregistered michael@mergington.edu from Chess Club',
    });
    expect(registry.listActivities()['Chess Club'].participants).toEqual(['daniel@mergington.edu']);
  });

  it('unregister rejects a non-member and leaves the roster unchanged', () => {
    const result = registry.unregister('Chess Club', 'notregistered@mergington.edu');
    expect(result).toEqual({
      success: false,
      error: { code: 'conflict', message: MESSAGES.notRegistered },
    });
    expect(registry.listActivities()['Chess Club'].participants).toEqual([
      'michael@mergington.edu',
      'daniel@mergington.edu',
    ]);
  });

  it('signUp then unregister restores the original roster', () => {
    const before = registry.listActivities()['Gym Class'].participants;

    expect(registry.signUp('Gym Class', 'testuser@mergington.edu').success).toBe(true);
    expect(registry.unregister('Gym Class', 'testuser@mergington.edu').success).toBe(true);

    expect(registry.listActivities()['Gym Class'].participants).toEqual(before);
  });

  it('the same participant can join several activities', () => {
    expect(registry.signUp('Chess Club', 'multi@mergington.edu').success).toBe(true);
    expect(registry.signUp('Programming Class', 'multi@mergington.edu').success).toBe(true);

    const activities = registry.listActivities();
    expect(activities['Chess Club'].participants).toContain('multi@mergington.edu');
    expect(activities['Programming Class'].participants).toContain('multi@mergington.edu');
  });

  it('instances do not share state', () => {
    registry.signUp('Chess Club', 'isolated@mergington.edu');
    const other = createActivityRegistry({ storage: createMemoryStorage() });
    expect(other.listActivities()['Chess Club'].participants).not.toContain('isolated@mergington.edu');
  });

  describe('capacity', () => {
    const tinySeed = {
      'Tiny Club': {
        description: 'Two seats only',
        schedule: 'Wednesdays, 4:00 PM - 5:00 PM',
        max_participants: 2,
        participants: ['first@mergington.edu'],
      },
    };

    it('rejects signups once the roster is full in enforce mode', () => {
      const tiny = createActivityRegistry({ storage: createMemoryStorage(tinySeed) });

      expect(tiny.signUp('Tiny Club', 'second@mergington.edu').success).toBe(true);
      expect(tiny.signUp('Tiny Club', 'third@mergington.edu')).toEqual({
        success: false,
        error: { code: 'capacity', message: 'Activity is full' },
      });
      expect(tiny.listActivities()['Tiny Club'].participants).toEqual([
        'first@mergington.edu',
        'second@mergington.edu',
      ]);
    });

    it('reports a duplicate before a full roster', () => {
      const tiny = createActivityRegistry({ storage: createMemoryStorage(tinySeed) });
      tiny.signUp('Tiny Club', 'second@mergington.edu');

      const result = tiny.signUp('Tiny Club', 'first@mergington.edu');
      expect(result).toEqual({
        success: false,
        error: { code: 'conflict', message: MESSAGES.alreadySignedUp },
      });
    });

    it('frees a seat after unregister', () => {
      const tiny = createActivityRegistry({ storage: createMemoryStorage(tinySeed) });
      tiny.signUp('Tiny Club', 'second@mergington.edu');
      tiny.unregister('Tiny Club', 'first@mergington.edu');

      expect(tiny.signUp('Tiny Club', 'third@mergington.edu').success).toBe(true);
    });

    it('only records capacity in track mode', () => {
      const tiny = createActivityRegistry({
        storage: createMemoryStorage(tinySeed),
        capacityMode: 'track',
      });
      tiny.signUp('Tiny Club', 'second@mergington.edu');

      expect(tiny.signUp('Tiny Club', 'third@mergington.edu').success).toBe(true);
      expect(tiny.listActivities()['Tiny Club'].participants).toHaveLength(3);
    });
  });
});
