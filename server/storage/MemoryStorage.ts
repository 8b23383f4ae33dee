/****
 * メモリストレージ（テストで flaky ゼロ）
 * 起動時の活動カタログを固定で持つ。インスタンスごとに独立
 */

import type { Activity, ActivityMap } from '../../src/types/activity';

export const SEED_ACTIVITIES: ActivityMap = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    max_participants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  'Programming Class': {
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    max_participants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  'Gym Class': {
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    max_participants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
};

export interface ActivityStorage {
  getActivityNames(): string[];
  /** スナップショットを返す（呼び出し側の変更は反映されない） */
  getActivity(name: string): Activity | null;

  // Roster
  hasParticipant(name: string, participant: string): boolean;
  addParticipant(name: string, participant: string): void;
  removeParticipant(name: string, participant: string): void;
}

function copyActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

export function createMemoryStorage(seed: ActivityMap = SEED_ACTIVITIES): ActivityStorage {
  const activities = new Map<string, Activity>(
    Object.entries(seed).map(([name, activity]) => [name, copyActivity(activity)])
  );

  return {
    getActivityNames() {
      return Array.from(activities.keys());
    },
    getActivity(name: string) {
      const activity = activities.get(name);
      return activity ? copyActivity(activity) : null;
    },
    hasParticipant(name: string, participant: string) {
      return activities.get(name)?.participants.includes(participant) ?? false;
    },
    addParticipant(name: string, participant: string) {
      activities.get(name)?.participants.push(participant);
    },
    removeParticipant(name: string, participant: string) {
      const activity = activities.get(name);
      if (!activity) return;
      const index = activity.participants.indexOf(participant);
      if (index >= 0) {
        activity.participants.splice(index, 1);
      }
    },
  };
}
