import {
  classifyVerdict,
  copyStateChanges,
  NarrativeIntegrationService,
} from './narrative-integration.service.js';
import { createResolutionResult } from './resolution-result.js';
import { ContractViolationError } from '../../common/errors/game-errors.js';
import {
  EMPTY_STATE_CHANGES,
  type ResolutionResult,
  type StateChanges,
} from '../../db/types/index.js';

function makeChanges(overrides: Partial<StateChanges> = {}): StateChanges {
  return { ...EMPTY_STATE_CHANGES, ...overrides };
}

// Lv1(+2) vs NORMAL(12)
const SUCCESS = createResolutionResult({ roll: 15, modifier: 2, target: 12, category: 'SKILL', damage: null });
const FAILURE = createResolutionResult({ roll: 5, modifier: 2, target: 12, category: 'SKILL', damage: null });
const CRITICAL = createResolutionResult({ roll: 20, modifier: 2, target: 12, category: 'COMBAT', damage: 6 });
const FUMBLE = createResolutionResult({ roll: 1, modifier: 2, target: 12, category: 'COMBAT', damage: 3 });

describe('NarrativeIntegrationService', () => {
  let service: NarrativeIntegrationService;
  const proposed = makeChanges({
    hpChange: -5,
    experienceGained: 10,
    itemsGained: ['key'],
    itemsLost: ['torch'],
    location: 'outside',
    npcsMet: ['gatekeeper'],
    discoveries: ['hidden door'],
  });

  beforeEach(() => {
    service = new NarrativeIntegrationService();
  });

  describe('판정 미적용 (dice_applied=false)', () => {
    it('제안 그대로 통과, 판정 결과 비노출', () => {
      const result = service.reconcile(FAILURE, false, makeChanges({ location: 'outside' }));
      expect(result.verdict).toBe('NON_MECHANICAL');
      expect(result.stateChanges).toEqual(makeChanges({ location: 'outside' }));
      expect(result.surfacedResolution).toBeNull();
      expect(result.selfDamage).toBe(0);
    });

    it('대실패여도 미적용이면 자해 없음', () => {
      const result = service.reconcile(FUMBLE, false, proposed);
      expect(result.stateChanges).toEqual(proposed);
      expect(result.selfDamage).toBe(0);
    });

    it.each([null, undefined])('플래그 %p → 미적용으로 간주', (flag) => {
      const result = service.reconcile(FAILURE, flag, proposed);
      expect(result.verdict).toBe('NON_MECHANICAL');
      expect(result.stateChanges.location).toBe('outside');
    });
  });

  describe('판정 적용 (dice_applied=true)', () => {
    it('성공 → 통과 + 노출', () => {
      const result = service.reconcile(SUCCESS, true, proposed);
      expect(result.verdict).toBe('MECHANICAL_SUCCESS');
      expect(result.stateChanges).toEqual(proposed);
      expect(result.surfacedResolution).toBe(SUCCESS);
      expect(result.selfDamage).toBe(0);
    });

    it('대성공 → 성공과 동일 처리', () => {
      const result = service.reconcile(CRITICAL, true, proposed);
      expect(result.verdict).toBe('MECHANICAL_SUCCESS');
      expect(result.stateChanges).toEqual(proposed);
      expect(result.selfDamage).toBe(0);
    });

    it('실패 → location/itemsGained 차단, 나머지 유지', () => {
      const result = service.reconcile(
        FAILURE,
        true,
        makeChanges({ location: 'outside', itemsGained: ['key'], hpChange: -5 }),
      );
      expect(result.verdict).toBe('MECHANICAL_FAILURE');
      expect(result.stateChanges.location).toBeNull();
      expect(result.stateChanges.itemsGained).toEqual([]);
      expect(result.stateChanges.hpChange).toBe(-5);
      expect(result.surfacedResolution).toBe(FAILURE);
      expect(result.selfDamage).toBe(0);
    });

    it('실패여도 손실/경험치/NPC/발견은 통과', () => {
      const result = service.reconcile(FAILURE, true, proposed);
      expect(result.stateChanges).toEqual({
        hpChange: -5,
        experienceGained: 10,
        itemsGained: [],
        itemsLost: ['torch'],
        location: null,
        npcsMet: ['gatekeeper'],
        discoveries: ['hidden door'],
      });
    });

    it('대실패 → 차단 + 서버 자해 피해 강제', () => {
      const result = service.reconcile(FUMBLE, true, proposed);
      expect(result.verdict).toBe('MECHANICAL_FUMBLE');
      expect(result.stateChanges.location).toBeNull();
      expect(result.stateChanges.itemsGained).toEqual([]);
      expect(result.stateChanges.hpChange).toBe(-5);
      expect(result.selfDamage).toBe(3);
      expect(result.surfacedResolution).toBe(FUMBLE);
    });
  });

  describe('불변성', () => {
    it('입력 묶음은 변경되지 않는다', () => {
      const input = makeChanges({ location: 'outside', itemsGained: ['key'] });
      service.reconcile(FAILURE, true, input);
      expect(input.location).toBe('outside');
      expect(input.itemsGained).toEqual(['key']);
    });

    it('결과 묶음은 새 동결 객체', () => {
      const result = service.reconcile(SUCCESS, true, proposed);
      expect(result.stateChanges).not.toBe(proposed);
      expect(Object.isFrozen(result.stateChanges)).toBe(true);
      expect(Object.isFrozen(result.stateChanges.itemsGained)).toBe(true);
    });
  });

  it('깨진 상태 변경 묶음 → ContractViolationError', () => {
    const broken = { ...proposed, hpChange: 'lots' };
    expect(() => Reflect.apply(service.reconcile, service, [SUCCESS, true, broken])).toThrow(
      ContractViolationError,
    );
  });

  it('피해 없는 대실패 결과 → ContractViolationError', () => {
    const forged: ResolutionResult = { ...FUMBLE, damage: null };
    expect(() => service.reconcile(forged, true, proposed)).toThrow(ContractViolationError);
  });
});

describe('classifyVerdict', () => {
  it.each([
    [SUCCESS, false, 'NON_MECHANICAL'],
    [FUMBLE, false, 'NON_MECHANICAL'],
    [SUCCESS, true, 'MECHANICAL_SUCCESS'],
    [CRITICAL, true, 'MECHANICAL_SUCCESS'],
    [FAILURE, true, 'MECHANICAL_FAILURE'],
    [FUMBLE, true, 'MECHANICAL_FUMBLE'],
  ] as const)('%#', (resolution, applied, verdict) => {
    expect(classifyVerdict(resolution, applied)).toBe(verdict);
  });
});

describe('copyStateChanges', () => {
  it('override 필드만 바꾼 새 묶음', () => {
    const base = makeChanges({ location: 'a', npcsMet: ['x'] });
    const copy = copyStateChanges(base, { location: 'b' });
    expect(copy).toEqual(makeChanges({ location: 'b', npcsMet: ['x'] }));
    expect(copy.npcsMet).not.toBe(base.npcsMet);
    expect(base.location).toBe('a');
  });
});
