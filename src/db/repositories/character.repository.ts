import { Inject, Injectable } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../drizzle.module.js';
import { characters } from '../schema/index.js';
import type { CharacterState } from '../types/index.js';
import type { CharacterRepository } from '../../turns/turn.ports.js';

@Injectable()
export class DrizzleCharacterRepository implements CharacterRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async findById(characterId: string): Promise<CharacterState | null> {
    const row = await this.db.query.characters.findFirst({
      where: eq(characters.id, characterId),
    });
    if (!row || !row.isActive) return null;
    return {
      id: row.id,
      name: row.name,
      level: row.level,
      hp: row.hp,
      maxHp: row.maxHp,
      experience: row.experience,
      currentExperience: row.currentExperience,
      inventory: row.inventory,
    };
  }
}
