// splitmix64 기반 난수원 — 판정 엔진에는 RandomSource 인터페이스로만 주입

import { randomUUID } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { ContractViolationError } from '../../common/errors/game-errors.js';

const MASK_64 = 0xFFFFFFFFFFFFFFFFn;

/** 판정 엔진이 소비하는 난수원 */
export interface RandomSource {
  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number;
}

export class Rng implements RandomSource {
  private state: bigint;
  private _cursor = 0;

  constructor(readonly seed: string) {
    this.state = Rng.hashSeed(seed);
  }

  private static hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this.state = (this.state + 0x9E3779B97F4A7C15n) & MASK_64;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** [0, 1) 실수, 상위 53비트만 사용 */
  next(): number {
    return Number(this.nextRaw() >> 11n) / 2 ** 53;
  }

  range(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new ContractViolationError(`Invalid range ${min}~${max}`);
    }
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  get cursor(): number {
    return this._cursor;
  }
}

/**
 * 미리 정한 값을 순서대로 돌려주는 난수원 (테스트/리플레이용).
 * 요청 범위를 벗어난 값이나 소진은 계약 위반.
 */
export class SequenceRng implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  range(min: number, max: number): number {
    if (this.index >= this.values.length) {
      throw new ContractViolationError('SequenceRng exhausted', {
        consumed: this.index,
      });
    }
    const value = this.values[this.index++];
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new ContractViolationError(
        `SequenceRng value ${value} outside ${min}~${max}`,
      );
    }
    return value;
  }

  get consumed(): number {
    return this.index;
  }
}

@Injectable()
export class RngService {
  /** seed 기반 결정적 RNG 인스턴스 생성 */
  create(seed: string): Rng {
    return new Rng(seed);
  }

  /** 액션마다 독립 seed. 동시 처리 중인 액션끼리 상태를 공유하지 않는다 */
  forAction(): RandomSource {
    return new Rng(randomUUID());
  }
}
