// 캐릭터 진행도/자원 스냅샷 — 영속화는 CharacterRepository 담당

export type CharacterState = {
  id: string;
  name: string;
  level: number;
  hp: number;
  maxHp: number;
  experience: number; // 누적 경험치
  currentExperience: number; // 현재 레벨 진행분
  inventory: string[];
};
