import { Injectable } from '@nestjs/common';
import { randomInt } from 'crypto';

export const CODE_GENERATOR = Symbol('CODE_GENERATOR');

export interface CodeGenerator {
  /** Returns `length` decimal digits; leading zeros are kept. */
  randomDigits(length: number): string;
}

@Injectable()
export class CryptoCodeGenerator implements CodeGenerator {
  randomDigits(length: number): string {
    let digits = '';
    for (let i = 0; i < length; i++) {
      digits += randomInt(0, 10).toString();
    }
    return digits;
  }
}
