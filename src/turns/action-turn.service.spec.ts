import { ActionTurnService, DEATH_EPILOGUE } from './action-turn.service.js';
import type { CharacterRepository, GameSessionRepository } from './turn.ports.js';
import { GameConfigService } from '../common/config/game-config.service.js';
import {
  InvalidInputError,
  NarrativeUnavailableError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { RngService, SequenceRng, type RandomSource } from '../engine/rng/rng.service.js';
import { ResolutionService } from '../engine/dice/resolution.service.js';
import { NarrativeIntegrationService } from '../engine/dice/narrative-integration.service.js';
import { CharacterStateService } from '../engine/state/character-state.service.js';
import { GameStateService } from '../engine/state/game-state.service.js';
import {
  EMPTY_GAME_STATE,
  EMPTY_STATE_CHANGES,
  type CharacterState,
  type GameSessionSnapshot,
  type ScenarioSnapshot,
  type SessionStatus,
  type StateChanges,
  type TurnCommit,
} from '../db/types/index.js';
import type {
  NarrativeGenerator,
  NarrativeRequest,
  NarrativeResponse,
} from '../llm/types/index.js';

const SESSION_ID = '11111111-1111-4111-8111-111111111111';

function makeCharacter(overrides: Partial<CharacterState> = {}): CharacterState {
  return {
    id: 'char-1',
    name: '아린',
    level: 1,
    hp: 100,
    maxHp: 100,
    experience: 0,
    currentExperience: 0,
    inventory: ['횃불'],
    ...overrides,
  };
}

function makeSession(overrides: Partial<GameSessionSnapshot> = {}): GameSessionSnapshot {
  return {
    id: SESSION_ID,
    characterId: 'char-1',
    scenarioId: 'scn-1',
    status: 'ACTIVE',
    currentLocation: '탑 입구',
    gameState: EMPTY_GAME_STATE,
    ...overrides,
  };
}

function makeNarrative(
  stateChanges: Partial<StateChanges>,
  mechanicsApplied: boolean,
  narrative = '문이 삐걱이며 열린다.',
): NarrativeResponse {
  return {
    narrative,
    options: ['들어간다', '돌아간다'],
    stateChanges: { ...EMPTY_STATE_CHANGES, ...stateChanges },
    mechanicsApplied,
    structured: true,
  };
}

class InMemoryCharacterRepository implements CharacterRepository {
  constructor(private readonly character: CharacterState | null) {}

  async findById(characterId: string): Promise<CharacterState | null> {
    return this.character?.id === characterId ? this.character : null;
  }
}

class InMemoryGameSessionRepository implements GameSessionRepository {
  readonly commits: TurnCommit[] = [];
  private status: SessionStatus;

  constructor(
    private readonly session: GameSessionSnapshot | null,
    private readonly scenario: ScenarioSnapshot | null,
  ) {
    this.status = session?.status ?? 'ACTIVE';
  }

  async findById(sessionId: string): Promise<GameSessionSnapshot | null> {
    if (this.session?.id !== sessionId) return null;
    return { ...this.session, status: this.status };
  }

  async findScenario(scenarioId: string): Promise<ScenarioSnapshot | null> {
    return this.scenario?.id === scenarioId ? this.scenario : null;
  }

  /** 다른 요청이 먼저 세션을 끝낸 상황 */
  complete(): void {
    this.status = 'COMPLETED';
  }

  // Drizzle 구현과 같은 규칙: ACTIVE일 때만 반영
  async commitTurn(commit: TurnCommit): Promise<void> {
    if (this.status !== 'ACTIVE') {
      throw new InvalidInputError('Session is not active', {
        sessionId: commit.sessionId,
      });
    }
    this.commits.push(commit);
    if (commit.endingType) this.status = 'COMPLETED';
  }
}

class ScriptedNarrator implements NarrativeGenerator {
  readonly requests: NarrativeRequest[] = [];
  /** 서술 생성이 끝나기 직전에 실행 (동시 요청 흉내) */
  beforeReturn: (() => void) | null = null;

  constructor(private readonly outcome: NarrativeResponse | Error) {}

  async generate(request: NarrativeRequest): Promise<NarrativeResponse> {
    this.requests.push(request);
    this.beforeReturn?.();
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

class ScriptedRngService extends RngService {
  constructor(private readonly rolls: number[]) {
    super();
  }

  forAction(): RandomSource {
    return new SequenceRng(this.rolls);
  }
}

class FixedGameConfigService extends GameConfigService {
  get() {
    return { defaultDifficulty: 'EASY' as const, databaseUrl: '' };
  }
}

interface Harness {
  service: ActionTurnService;
  sessions: InMemoryGameSessionRepository;
  narrator: ScriptedNarrator;
}

function setup(options: {
  rolls: number[];
  narrative: NarrativeResponse | Error;
  character?: CharacterState | null;
  session?: GameSessionSnapshot | null;
  scenario?: ScenarioSnapshot | null;
}): Harness {
  const sessions = new InMemoryGameSessionRepository(
    options.session === undefined ? makeSession() : options.session,
    options.scenario === undefined
      ? { id: 'scn-1', name: '잊힌 탑', worldSetting: '폐허 도시', difficulty: 'NORMAL' }
      : options.scenario,
  );
  const narrator = new ScriptedNarrator(options.narrative);
  const service = new ActionTurnService(
    new InMemoryCharacterRepository(
      options.character === undefined ? makeCharacter() : options.character,
    ),
    sessions,
    narrator,
    new FixedGameConfigService(),
    new ScriptedRngService(options.rolls),
    new ResolutionService(),
    new NarrativeIntegrationService(),
    new CharacterStateService(),
    new GameStateService(),
  );
  return { service, sessions, narrator };
}

describe('ActionTurnService', () => {
  describe('판정 적용 성공', () => {
    it('이동/보상 반영, 판정 결과 노출, 한 번에 커밋', async () => {
      const { service, sessions, narrator } = setup({
        rolls: [15],
        narrative: makeNarrative(
          { location: '지하실', itemsGained: ['열쇠'], experienceGained: 20 },
          true,
        ),
      });

      const result = await service.processAction({
        sessionId: SESSION_ID,
        action: '지하실 문을 조사한다',
      });

      expect(result.resolution).toEqual({
        roll: 15,
        modifier: 2,
        total: 17,
        dc: 12,
        isSuccess: true,
        isCritical: false,
        isFumble: false,
        category: 'EXPLORATION',
        damage: null,
        summary: '🎲 1d20+2 = 17 vs DC 12 → 성공!',
      });
      expect(result.verdict).toBe('MECHANICAL_SUCCESS');
      expect(result.narrative).toBe('문이 삐걱이며 열린다.');
      expect(result.options).toEqual(['들어간다', '돌아간다']);
      expect(result.isTerminated).toBe(false);
      expect(result.character.inventory).toEqual(['횃불', '열쇠']);
      expect(result.character.experience).toBe(20);

      expect(narrator.requests).toHaveLength(1);
      expect(narrator.requests[0].resolution.roll).toBe(15);

      expect(sessions.commits).toEqual([
        {
          sessionId: SESSION_ID,
          character: result.character,
          currentLocation: '지하실',
          gameState: {
            items: ['열쇠'],
            visitedLocations: ['지하실'],
            metNpcs: [],
            discoveries: [],
          },
          endingType: null,
        },
      ]);
    });
  });

  describe('판정 적용 실패', () => {
    it('이동/획득 차단, 피해는 통과', async () => {
      const { service, sessions } = setup({
        rolls: [5],
        narrative: makeNarrative(
          { location: '지하실', itemsGained: ['열쇠'], hpChange: -5 },
          true,
        ),
      });

      const result = await service.processAction({
        sessionId: SESSION_ID,
        action: '잠긴 문을 연다',
      });

      expect(result.resolution?.isSuccess).toBe(false);
      expect(result.resolution?.category).toBe('SKILL');
      expect(result.stateChanges.location).toBeNull();
      expect(result.stateChanges.itemsGained).toEqual([]);
      expect(result.character.hp).toBe(95);
      expect(result.character.inventory).toEqual(['횃불']);
      expect(sessions.commits[0].currentLocation).toBe('탑 입구');
    });
  });

  describe('판정 미적용', () => {
    it('제안 그대로 반영, 판정 결과 null', async () => {
      const { service, sessions } = setup({
        rolls: [3],
        narrative: makeNarrative({ location: '광장' }, false),
      });

      const result = await service.processAction({
        sessionId: SESSION_ID,
        action: '광장으로 걸어간다',
      });

      expect(result.resolution).toBeNull();
      expect(result.verdict).toBe('NON_MECHANICAL');
      expect(sessions.commits[0].currentLocation).toBe('광장');
    });

    it('대실패가 나와도 미적용이면 자해 없음', async () => {
      const { service } = setup({
        rolls: [1, 4],
        character: makeCharacter({ hp: 2 }),
        narrative: makeNarrative({}, false),
      });

      const result = await service.processAction({
        sessionId: SESSION_ID,
        action: '주변을 둘러본다',
      });

      expect(result.character.hp).toBe(2);
      expect(result.isTerminated).toBe(false);
    });
  });

  describe('대실패 사망', () => {
    it('HP 1, 자해 3 → HP -2, 세션 종료', async () => {
      const { service, sessions } = setup({
        rolls: [1, 3],
        character: makeCharacter({ hp: 1 }),
        narrative: makeNarrative({}, true, '발을 헛디뎌 넘어진다.'),
      });

      const result = await service.processAction({
        sessionId: SESSION_ID,
        action: '절벽을 뛰어넘는다',
      });

      expect(result.resolution?.isFumble).toBe(true);
      expect(result.resolution?.damage).toBe(3);
      expect(result.character.hp).toBe(-2);
      expect(result.isTerminated).toBe(true);
      expect(result.narrative).toBe(`발을 헛디뎌 넘어진다.${DEATH_EPILOGUE}`);
      expect(result.options).toEqual([]);
      expect(sessions.commits[0].endingType).toBe('DEFEAT');
    });
  });

  describe('난이도/유형 결정', () => {
    it('시나리오 난이도 우선', async () => {
      const { service } = setup({
        rolls: [10],
        scenario: { id: 'scn-1', name: '잊힌 탑', worldSetting: '폐허 도시', difficulty: 'HARD' },
        narrative: makeNarrative({}, true),
      });
      const result = await service.processAction({ sessionId: SESSION_ID, action: '기어오른다' });
      expect(result.resolution?.dc).toBe(15);
    });

    it('시나리오 난이도 없으면 설정 기본값', async () => {
      const { service } = setup({
        rolls: [10],
        scenario: { id: 'scn-1', name: '잊힌 탑', worldSetting: '폐허 도시', difficulty: null },
        narrative: makeNarrative({}, true),
      });
      const result = await service.processAction({ sessionId: SESSION_ID, action: '기어오른다' });
      expect(result.resolution?.dc).toBe(8);
    });

    it('명시한 유형이 키워드 분류보다 우선', async () => {
      const { service } = setup({ rolls: [10], narrative: makeNarrative({}, true) });
      const result = await service.processAction({
        sessionId: SESSION_ID,
        action: '고블린을 공격한다',
        category: 'SOCIAL',
      });
      expect(result.resolution?.category).toBe('SOCIAL');
    });
  });

  describe('동시 요청', () => {
    it('서술 생성 중 다른 턴이 세션을 종료 → 커밋 거부, 아무것도 저장하지 않음', async () => {
      const { service, sessions, narrator } = setup({
        rolls: [15],
        narrative: makeNarrative({ hpChange: 10 }, true),
      });
      narrator.beforeReturn = () => sessions.complete();

      await expect(
        service.processAction({ sessionId: SESSION_ID, action: '상처를 치료한다' }),
      ).rejects.toBeInstanceOf(InvalidInputError);
      expect(sessions.commits).toHaveLength(0);
    });

    it('같은 세션 두 턴이 겹치면 사망 턴만 반영, 다른 턴은 거부', async () => {
      const { service, sessions } = setup({
        rolls: [10],
        character: makeCharacter({ hp: 3 }),
        narrative: makeNarrative({ hpChange: -5 }, false),
      });

      const results = await Promise.allSettled([
        service.processAction({ sessionId: SESSION_ID, action: '함정을 밟는다' }),
        service.processAction({ sessionId: SESSION_ID, action: '함정을 밟는다' }),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(InvalidInputError);
      expect(sessions.commits).toHaveLength(1);
      expect(sessions.commits[0].endingType).toBe('DEFEAT');
      expect(sessions.commits[0].character.hp).toBe(-2);
    });
  });

  describe('오류', () => {
    it('서술 생성 실패 → 전파, 아무것도 저장하지 않음', async () => {
      const { service, sessions } = setup({
        rolls: [15],
        narrative: new NarrativeUnavailableError('All providers failed after 3 attempts'),
      });

      await expect(
        service.processAction({ sessionId: SESSION_ID, action: '문을 연다' }),
      ).rejects.toBeInstanceOf(NarrativeUnavailableError);
      expect(sessions.commits).toHaveLength(0);
    });

    it('세션 없음 → NotFoundError', async () => {
      const { service } = setup({ rolls: [10], session: null, narrative: makeNarrative({}, false) });
      await expect(
        service.processAction({ sessionId: SESSION_ID, action: '문을 연다' }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('종료된 세션 → InvalidInputError', async () => {
      const { service, narrator } = setup({
        rolls: [10],
        session: makeSession({ status: 'COMPLETED' }),
        narrative: makeNarrative({}, false),
      });
      await expect(
        service.processAction({ sessionId: SESSION_ID, action: '문을 연다' }),
      ).rejects.toBeInstanceOf(InvalidInputError);
      expect(narrator.requests).toHaveLength(0);
    });

    it('캐릭터 없음 → NotFoundError', async () => {
      const { service } = setup({ rolls: [10], character: null, narrative: makeNarrative({}, false) });
      await expect(
        service.processAction({ sessionId: SESSION_ID, action: '문을 연다' }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('빈 행동 → InvalidInputError', async () => {
      const { service } = setup({ rolls: [10], narrative: makeNarrative({}, false) });
      await expect(
        service.processAction({ sessionId: SESSION_ID, action: '   ' }),
      ).rejects.toBeInstanceOf(InvalidInputError);
    });
  });
});
