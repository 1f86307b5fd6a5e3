import type { ServiceConfig } from '../types/user';

export type NicknameFailure = 'invalid_format' | 'reserved';

export type NicknameValidation =
  | { ok: true; nickname: string }
  | { ok: false; reason: NicknameFailure; message: string };

export type NicknameRules = Pick<ServiceConfig, 'nicknameMinLen' | 'nicknameMaxLen' | 'reservedNicknames'>;

export type ValidateOptions = {
  checkReserved?: boolean;
};

const ALLOWED_CHARACTERS = /^[A-Za-z0-9_-]+$/;
const ALPHANUMERIC_START = /^[A-Za-z0-9]/;
const ALPHANUMERIC_END = /[A-Za-z0-9]$/;
const CONSECUTIVE_SPECIALS = /[_-]{2,}/;

function invalid(message: string): NicknameValidation {
  return { ok: false, reason: 'invalid_format', message };
}

export class NicknameValidator {
  private readonly reserved: ReadonlySet<string>;

  constructor(private readonly rules: NicknameRules) {
    this.reserved = new Set(rules.reservedNicknames.map((word) => word.toLowerCase()));
  }

  validate(candidate: string, options: ValidateOptions = {}): NicknameValidation {
    const { nicknameMinLen: min, nicknameMaxLen: max } = this.rules;

    if (candidate.length < min) return invalid(`Nickname must be at least ${min} characters long`);
    if (candidate.length > max) return invalid(`Nickname must be no more than ${max} characters long`);
    if (!ALLOWED_CHARACTERS.test(candidate)) {
      return invalid('Nickname can only contain letters, numbers, underscores, and hyphens');
    }
    if (!ALPHANUMERIC_START.test(candidate)) return invalid('Nickname must start with a letter or number');
    if (!ALPHANUMERIC_END.test(candidate)) return invalid('Nickname must end with a letter or number');
    if (CONSECUTIVE_SPECIALS.test(candidate)) {
      return invalid('Nickname cannot contain consecutive underscores or hyphens');
    }

    if ((options.checkReserved ?? true) && this.reserved.has(candidate.toLowerCase())) {
      return { ok: false, reason: 'reserved', message: `Nickname "${candidate}" is reserved and cannot be used` };
    }

    return { ok: true, nickname: candidate };
  }
}
