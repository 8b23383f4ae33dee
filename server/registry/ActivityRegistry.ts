/**
 * 活動レジストリ（一覧 / signup / unregister）
 *
 * 検証はすべて変更より先に行う。拒否された操作は状態を変えない。
 * 各操作は同期処理のため、同一プロセス内で check-then-act が割り込まれることはない。
 */

import type {
  ActivityMap,
  CapacityMode,
  RegistrationErrorCode,
  RegistrationResult,
} from '../../src/types/activity';
import type { ActivityStorage } from '../storage/MemoryStorage';
import { createLogger } from '../utils/log';

export interface ActivityRegistryDeps {
  storage: ActivityStorage;
  capacityMode?: CapacityMode;
}

export interface ActivityRegistry {
  listActivities(): ActivityMap;
  signUp(activityName: string, participant: string): RegistrationResult;
  unregister(activityName: string, participant: string): RegistrationResult;
}

export const MESSAGES = {
  notFound: 'Activity not found',
  alreadySignedUp: 'Student is already signed up for this activity',
  notRegistered: 'Student is not registered for this activity',
  full: 'Activity is full',
} as const;

const log = createLogger('registry');

function fail(code: RegistrationErrorCode, message: string): RegistrationResult {
  return { success: false, error: { code, message } };
}

export function createActivityRegistry(deps: ActivityRegistryDeps): ActivityRegistry {
  const { storage } = deps;
  const capacityMode = deps.capacityMode ?? 'enforce';

  return {
    listActivities() {
      const result: ActivityMap = {};
      for (const name of storage.getActivityNames()) {
        const activity = storage.getActivity(name);
        if (activity) result[name] = activity;
      }
      return result;
    },

    signUp(activityName: string, participant: string) {
      const activity = storage.getActivity(activityName);
      if (!activity) {
        log.debug('signup rejected: not found', activityName);
        return fail('not_found', MESSAGES.notFound);
      }
      if (storage.hasParticipant(activityName, participant)) {
        log.debug('signup rejected: duplicate', activityName, participant);
        return fail('conflict', MESSAGES.alreadySignedUp);
      }
      if (capacityMode === 'enforce' && activity.participants.length >= activity.max_participants) {
        log.debug('signup rejected: full', activityName, participant);
        return fail('capacity', MESSAGES.full);
      }

      storage.addParticipant(activityName, participant);
      log.info('signed up', participant, 'for', activityName);
      return { success: true, message: `Signed up ${participant} for ${activityName}` };
    },

    unregister(activityName: string, participant: string) {
      if (!storage.getActivity(activityName)) {
        log.debug('unregister rejected: not found', activityName);
        return fail('not_found', MESSAGES.notFound);
      }
      if (!storage.hasParticipant(activityName, participant)) {
        log.debug('unregister rejected: not registered', activityName, participant);
        return fail('conflict', MESSAGES.notRegistered);
      }

      storage.removeParticipant(activityName, participant);
      log.info('unregistered', participant, 'from', activityName);
      return { success: true, message: `Unregistered ${participant} from ${activityName}` };
    },
  };
}
