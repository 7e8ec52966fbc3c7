import { Injectable } from '@nestjs/common';
import type { GameState, StateChanges } from '../../db/types/index.js';

function appendUnique(base: readonly string[], additions: readonly string[]): string[] {
  const out = [...base];
  for (const value of additions) {
    if (!out.includes(value)) out.push(value);
  }
  return out;
}

@Injectable()
export class GameStateService {
  /** 세션 게임 상태에 변경 누적 (중복 제거, 순서 유지) */
  apply(state: GameState, changes: StateChanges): GameState {
    const lost = new Set(changes.itemsLost);
    return {
      items: appendUnique(state.items, changes.itemsGained).filter((item) => !lost.has(item)),
      visitedLocations: changes.location
        ? appendUnique(state.visitedLocations, [changes.location])
        : [...state.visitedLocations],
      metNpcs: appendUnique(state.metNpcs, changes.npcsMet),
      discoveries: appendUnique(state.discoveries, changes.discoveries),
    };
  }
}
