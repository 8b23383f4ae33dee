/**
 * 課外活動（部活動・クラス）の型定義
 * API・registry・storage で共通利用。フィールド名は HTTP レスポンスと一致
 */

export interface Activity {
  description: string;
  schedule: string;
  /** 定員（正の整数） */
  max_participants: number;
  /** 参加者ID（メールアドレス等）。重複なし・登録順 */
  participants: string[];
}

/** 活動名 → Activity */
export type ActivityMap = Record<string, Activity>;

/** エラー種別（HTTP ステータスの分岐は code のみで行う） */
export type RegistrationErrorCode =
  | 'not_found'  // 活動が存在しない
  | 'conflict'   // 登録済みで signup / 未登録で unregister
  | 'capacity';  // 定員超過

export interface RegistrationErrorInfo {
  code: RegistrationErrorCode;
  message: string;
}

export interface RegistrationResultSuccess {
  success: true;
  message: string;
}

export interface RegistrationResultFailure {
  success: false;
  error: RegistrationErrorInfo;
}

export type RegistrationResult = RegistrationResultSuccess | RegistrationResultFailure;

/**
 * 定員の扱い
 * - enforce: 定員に達した活動への signup を拒否
 * - track: 定員は記録のみ（チェックしない）
 */
export type CapacityMode = 'enforce' | 'track';
