import type { EraInterpretation } from '@passbook/types';

export interface LearnedBankFormat {
  bankCode: string;
  bankName: string | null;
  format: EraInterpretation;
  /** ISO timestamp of the confirmation */
  confirmedAt: string;
  /** Printed date the user looked at when confirming, if any */
  sampleDate: string | null;
}

export interface LearnDetails {
  bankName?: string;
  sampleDate?: string;
  confirmedAt?: Date;
}

/**
 * Bank code → confirmed era interpretation. One table per caller or session;
 * an engine reads it on every call, so share a table only between engines
 * that serve the same tenant.
 */
export class LearnedFormatTable {
  private readonly formats = new Map<string, LearnedBankFormat>();

  constructor(initial: Iterable<LearnedBankFormat> = []) {
    for (const entry of initial) {
      this.formats.set(entry.bankCode, { ...entry });
    }
  }

  learn(bankCode: string, format: EraInterpretation, details: LearnDetails = {}): LearnedBankFormat {
    const entry: LearnedBankFormat = {
      bankCode,
      bankName: details.bankName ?? null,
      format,
      confirmedAt: (details.confirmedAt ?? new Date()).toISOString(),
      sampleDate: details.sampleDate ?? null,
    };
    this.formats.set(bankCode, entry);
    return { ...entry };
  }

  get(bankCode: string): LearnedBankFormat | undefined {
    const entry = this.formats.get(bankCode);
    return entry === undefined ? undefined : { ...entry };
  }

  get size(): number {
    return this.formats.size;
  }

  snapshot(): Map<string, LearnedBankFormat> {
    return new Map([...this.formats].map(([code, entry]) => [code, { ...entry }]));
  }
}
