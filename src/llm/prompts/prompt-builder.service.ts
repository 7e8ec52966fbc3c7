// 프롬프트 조립: system(고정 규칙) → user(상황 + 판정 결과 + 플레이어 행동)

import { Injectable } from '@nestjs/common';
import type { LlmMessage, NarrativeRequest } from '../types/index.js';
import type { ResolutionResult } from '../../db/types/index.js';
import { DICE_RULES, GAME_MASTER_SYSTEM_PROMPT } from './game-master-prompt.js';

const CATEGORY_LABEL = {
  COMBAT: '전투',
  SKILL: '기술',
  SOCIAL: '사교',
  EXPLORATION: '탐험',
} as const;

@Injectable()
export class PromptBuilderService {
  buildNarrativePrompt(req: NarrativeRequest): LlmMessage[] {
    const parts: string[] = [];

    if (req.scenario) {
      parts.push(`[시나리오]\n${req.scenario.name}\n${req.scenario.worldSetting}`);
    }

    const c = req.character;
    parts.push(`[캐릭터]\n${c.name} (Lv${c.level}, HP ${c.hp}/${c.maxHp})`);
    parts.push(`[현재 위치]\n${req.session.currentLocation}`);
    parts.push(
      `[소지품]\n${c.inventory.length > 0 ? c.inventory.join(', ') : '없음'}`,
    );

    const discoveries = req.session.gameState.discoveries;
    if (discoveries.length > 0) {
      parts.push(`[발견한 것들]\n${discoveries.join(', ')}`);
    }

    parts.push(this.renderResolution(req.resolution));
    parts.push(`[플레이어 행동]\n${req.action}`);

    return [
      { role: 'system', content: GAME_MASTER_SYSTEM_PROMPT },
      { role: 'user', content: parts.join('\n\n') },
    ];
  }

  /** 판정 결과 블록. 서술 생성기가 반드시 따라야 하는 입력 컨텍스트 */
  renderResolution(r: ResolutionResult): string {
    const lines = [
      '[주사위 판정 결과]',
      `${CATEGORY_LABEL[r.category]} 판정: ${r.summary}`,
    ];
    if (r.isCritical && r.damage !== null) {
      lines.push(`치명타 피해: ${r.damage}`);
    }
    if (r.isFumble && r.damage !== null) {
      lines.push(`자해 피해: ${r.damage} (서버가 HP에 직접 반영)`);
    }
    lines.push(...DICE_RULES.map((rule) => `- ${rule}`));
    return lines.join('\n');
  }
}
