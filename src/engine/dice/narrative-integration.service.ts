// 서술 생성기 제안 상태 변경 ↔ 판정 결과 조정

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import type {
  IntegrationVerdict,
  ResolutionResult,
  StateChanges,
} from '../../db/types/index.js';
import { ContractViolationError, invariant } from '../../common/errors/game-errors.js';

export interface IntegrationRule {
  /** location 변경과 획득 아이템을 막는가 */
  blockProgress: boolean;
  /** 응답에 판정 결과를 노출하는가 */
  surfaceResolution: boolean;
  /** 서버가 굴린 자해 피해를 강제하는가 */
  forceSelfDamage: boolean;
}

/**
 * | diceApplied | 판정          | location/itemsGained | 기타     | 노출 |
 * |-------------|---------------|----------------------|----------|------|
 * | false       | (무시)        | 통과                 | 통과     | X    |
 * | true        | 성공/대성공   | 통과                 | 통과     | O    |
 * | true        | 실패          | 차단                 | 통과     | O    |
 * | true        | 대실패        | 차단                 | 통과+자해 | O    |
 */
export const INTEGRATION_RULES: Readonly<Record<IntegrationVerdict, IntegrationRule>> = {
  NON_MECHANICAL: { blockProgress: false, surfaceResolution: false, forceSelfDamage: false },
  MECHANICAL_SUCCESS: { blockProgress: false, surfaceResolution: true, forceSelfDamage: false },
  MECHANICAL_FAILURE: { blockProgress: true, surfaceResolution: true, forceSelfDamage: false },
  MECHANICAL_FUMBLE: { blockProgress: true, surfaceResolution: true, forceSelfDamage: true },
};

export interface ReconcileResult {
  verdict: IntegrationVerdict;
  stateChanges: StateChanges;
  /** null이면 호출자는 응답에 판정 결과를 붙이지 않는다 */
  surfacedResolution: ResolutionResult | null;
  /** 상태 변경과 별도로 캐릭터 자원에 적용할 서버 확정 자해 피해 (대실패 외 0) */
  selfDamage: number;
}

const StateChangesShape = z.object({
  hpChange: z.number().int(),
  experienceGained: z.number().int().min(0),
  itemsGained: z.array(z.string()),
  itemsLost: z.array(z.string()),
  location: z.string().nullable(),
  npcsMet: z.array(z.string()),
  discoveries: z.array(z.string()),
});

export function classifyVerdict(
  resolution: ResolutionResult,
  mechanicsApplied: boolean,
): IntegrationVerdict {
  if (!mechanicsApplied) return 'NON_MECHANICAL';
  if (resolution.isSuccess) return 'MECHANICAL_SUCCESS';
  if (resolution.isFumble) return 'MECHANICAL_FUMBLE';
  return 'MECHANICAL_FAILURE';
}

@Injectable()
export class NarrativeIntegrationService {
  private readonly logger = new Logger(NarrativeIntegrationService.name);

  /**
   * 생성기가 제안한 상태 변경 중 신뢰할 부분만 남긴다.
   * - diceApplied 누락 = false (일상 행동으로 간주)
   * - 실패는 피해/손실은 허용하되 이동/보상은 막는다
   * - 입력 객체는 변경하지 않고 새 묶음을 만든다
   */
  reconcile(
    resolution: ResolutionResult,
    mechanicsApplied: boolean | null | undefined,
    proposed: StateChanges,
  ): ReconcileResult {
    this.assertStateChanges(proposed);

    const verdict = classifyVerdict(resolution, mechanicsApplied === true);
    const rule = INTEGRATION_RULES[verdict];

    let selfDamage = 0;
    if (rule.forceSelfDamage) {
      invariant(
        resolution.damage !== null,
        'Fumble resolution without self-damage',
      );
      selfDamage = resolution.damage;
    }

    if (rule.blockProgress && (proposed.location !== null || proposed.itemsGained.length > 0)) {
      this.logger.log(
        `${verdict}: blocked location=${proposed.location ?? '-'} itemsGained=[${proposed.itemsGained.join(', ')}]`,
      );
    }
    if (selfDamage > 0) {
      this.logger.log(`${verdict}: forced self-damage ${selfDamage}`);
    }

    return {
      verdict,
      stateChanges: copyStateChanges(
        proposed,
        rule.blockProgress ? { location: null, itemsGained: [] } : {},
      ),
      surfacedResolution: rule.surfaceResolution ? resolution : null,
      selfDamage,
    };
  }

  private assertStateChanges(proposed: StateChanges): void {
    const parsed = StateChangesShape.safeParse(proposed);
    if (!parsed.success) {
      throw new ContractViolationError('Malformed state changes', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
  }
}

/** 원본 + override로 새 불변 묶음 생성 */
export function copyStateChanges(
  base: StateChanges,
  overrides: Partial<StateChanges> = {},
): StateChanges {
  const merged = { ...base, ...overrides };
  return Object.freeze({
    hpChange: merged.hpChange,
    experienceGained: merged.experienceGained,
    itemsGained: Object.freeze([...merged.itemsGained]),
    itemsLost: Object.freeze([...merged.itemsLost]),
    location: merged.location,
    npcsMet: Object.freeze([...merged.npcsMet]),
    discoveries: Object.freeze([...merged.discoveries]),
  });
}
