// Canonical Enums

export const DIFFICULTY_TIER = ['EASY', 'NORMAL', 'HARD', 'NIGHTMARE'] as const;
export type DifficultyTier = (typeof DIFFICULTY_TIER)[number];

export const CHECK_CATEGORY = ['COMBAT', 'SKILL', 'SOCIAL', 'EXPLORATION'] as const;
export type CheckCategory = (typeof CHECK_CATEGORY)[number];

export const SESSION_STATUS = ['ACTIVE', 'COMPLETED'] as const;
export type SessionStatus = (typeof SESSION_STATUS)[number];

export const ENDING_TYPE = ['VICTORY', 'DEFEAT', 'NEUTRAL'] as const;
export type EndingType = (typeof ENDING_TYPE)[number];

// 서술 생성기 응답과 판정 결과의 조합 (NarrativeIntegrationService 결정 테이블 키)
export const INTEGRATION_VERDICT = [
  'NON_MECHANICAL',
  'MECHANICAL_SUCCESS',
  'MECHANICAL_FAILURE',
  'MECHANICAL_FUMBLE',
] as const;
export type IntegrationVerdict = (typeof INTEGRATION_VERDICT)[number];

export function isDifficultyTier(value: unknown): value is DifficultyTier {
  return (
    typeof value === 'string' &&
    (DIFFICULTY_TIER as readonly string[]).includes(value)
  );
}

export function isCheckCategory(value: unknown): value is CheckCategory {
  return (
    typeof value === 'string' &&
    (CHECK_CATEGORY as readonly string[]).includes(value)
  );
}
