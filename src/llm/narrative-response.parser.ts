// 서술 생성기 원문 → NarrativeResponse
// JSON 파싱 3단계: 직접 → 코드블록 → {…} 추출. 전부 실패하면 원문을 서술로 쓰고 상태 변경은 비운다.

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { EMPTY_STATE_CHANGES, type StateChanges } from '../db/types/index.js';
import type { NarrativeResponse } from './types/index.js';

const MAX_OPTIONS = 5;
const OPTION_LINE = /^(?:[1-5]\.|-|•)/;

// 문자열이 아닌 항목/빈 문자열은 버린다
const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((list) =>
    list
      .filter((v): v is string => typeof v === 'string')
      .map((v) => v.trim())
      .filter((v) => v.length > 0),
  );

const RawStateChangesSchema = z.object({
  hp_change: z.number().int().catch(0),
  experience_gained: z.number().int().min(0).catch(0),
  items_gained: stringList,
  items_lost: stringList,
  location: z.string().trim().min(1).nullable().catch(null),
  npcs_met: stringList,
  discoveries: stringList,
});

const RawNarrativeSchema = z.object({
  narrative: z.string().trim().min(1),
  options: stringList,
  state_changes: z.unknown().optional(),
  dice_applied: z.unknown().optional(),
});

@Injectable()
export class NarrativeResponseParser {
  private readonly logger = new Logger(NarrativeResponseParser.name);

  parse(text: string): NarrativeResponse {
    const candidates = [
      text.trim(),
      this.extractFromCodeBlock(text),
      this.extractJsonBraces(text),
    ];

    for (const candidate of candidates) {
      if (!candidate) continue;
      let json: unknown;
      try {
        json = JSON.parse(candidate);
      } catch {
        continue; // 다음 후보 시도
      }
      const parsed = RawNarrativeSchema.safeParse(json);
      if (!parsed.success) continue;

      return {
        narrative: parsed.data.narrative,
        options: parsed.data.options.slice(0, MAX_OPTIONS),
        stateChanges: this.toStateChanges(parsed.data.state_changes),
        // boolean true만 인정, 누락/문자열/숫자는 전부 false
        mechanicsApplied: parsed.data.dice_applied === true,
        structured: true,
      };
    }

    this.logger.warn(`JSON parse failed: ${text.slice(0, 200)}`);
    return {
      narrative: text.trim(),
      options: this.extractOptionLines(text),
      stateChanges: EMPTY_STATE_CHANGES,
      mechanicsApplied: false,
      structured: false,
    };
  }

  toStateChanges(raw: unknown): StateChanges {
    const parsed = RawStateChangesSchema.safeParse(raw ?? {});
    if (!parsed.success) return EMPTY_STATE_CHANGES;
    const s = parsed.data;
    return Object.freeze({
      hpChange: s.hp_change,
      experienceGained: s.experience_gained,
      itemsGained: Object.freeze(s.items_gained),
      itemsLost: Object.freeze(s.items_lost),
      location: s.location,
      npcsMet: Object.freeze(s.npcs_met),
      discoveries: Object.freeze(s.discoveries),
    });
  }

  private extractFromCodeBlock(text: string): string | null {
    const match = text.match(/```(?:json)?\s*([\s\S]*?)```/);
    return match?.[1]?.trim() ?? null;
  }

  private extractJsonBraces(text: string): string | null {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end === -1 || end <= start) return null;
    return text.slice(start, end + 1);
  }

  private extractOptionLines(text: string): string[] {
    return text
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => OPTION_LINE.test(line))
      .slice(0, MAX_OPTIONS);
  }
}
