// 자유 입력 → 판정 유형 키워드 매핑 (표시/서술용, 수치에는 영향 없음)

import type { CheckCategory } from '../../db/types/index.js';

interface KeywordEntry {
  category: CheckCategory;
  keywords: string[];
}

// 먼저 매칭된 항목 우선
const KEYWORD_MAP: KeywordEntry[] = [
  {
    category: 'COMBAT',
    keywords: ['공격', '베어', '찌르', '때리', '쏜다', '싸우', 'attack', 'fight', 'strike', 'shoot'],
  },
  {
    category: 'SOCIAL',
    keywords: ['설득', '협상', '위협', '속이', '대화', 'persuade', 'negotiate', 'threaten', 'deceive'],
  },
  {
    category: 'EXPLORATION',
    keywords: ['탐색', '조사', '살펴', '이동', '들어가', 'explore', 'search', 'investigate', 'enter'],
  },
];

export const DEFAULT_CHECK_CATEGORY: CheckCategory = 'SKILL';

export function classifyAction(text: string): CheckCategory {
  const normalized = text.toLowerCase();
  for (const entry of KEYWORD_MAP) {
    if (entry.keywords.some((kw) => normalized.includes(kw))) {
      return entry.category;
    }
  }
  return DEFAULT_CHECK_CATEGORY;
}
