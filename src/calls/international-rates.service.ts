// src/calls/international-rates.service.ts

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { InternationalRate, InternationalRateDocument } from './international-rate.schema';

export type RateView = {
  country_code: string;
  country_name: string;
  rate_per_minute: number;
};

type RateRow = Pick<InternationalRate, 'countryCode' | 'countryName' | 'ratePerMinute'>;

const DEFAULT_RATES: RateRow[] = [
  { countryCode: '+91', countryName: 'India', ratePerMinute: 0.025 },
  { countryCode: '+1', countryName: 'United States/Canada', ratePerMinute: 0.015 },
  { countryCode: '+44', countryName: 'United Kingdom', ratePerMinute: 0.02 },
  { countryCode: '+61', countryName: 'Australia', ratePerMinute: 0.03 },
];

/** Longest dialling prefix wins, so +1 never shadows a longer +1xxx entry. */
export function matchCountryCode(destination: string, rates: Pick<RateRow, 'countryCode'>[]): string | null {
  const dest = destination.trim();
  if (!dest.startsWith('+')) return null;

  let best: string | null = null;
  for (const r of rates) {
    if (dest.startsWith(r.countryCode) && (!best || r.countryCode.length > best.length)) {
      best = r.countryCode;
    }
  }
  return best;
}

@Injectable()
export class InternationalRatesService implements OnModuleInit {
  private readonly logger = new Logger(InternationalRatesService.name);

  constructor(@InjectModel(InternationalRate.name) private readonly model: Model<InternationalRateDocument>) {}

  async onModuleInit() {
    const existing = await this.model.estimatedDocumentCount().exec();
    if (existing > 0) return;

    await this.model.insertMany(DEFAULT_RATES.map((r) => ({ ...r, isActive: true })));
    this.logger.log(`seeded ${DEFAULT_RATES.length} international rates`);
  }

  async listActive(): Promise<RateView[]> {
    const rows = await this.model.find({ isActive: true }).sort({ countryCode: 1 }).lean<InternationalRate[]>().exec();
    return rows.map((r) => ({
      country_code: r.countryCode,
      country_name: r.countryName,
      rate_per_minute: r.ratePerMinute,
    }));
  }

  async resolveCountryCode(destination: string): Promise<string | null> {
    const rows = await this.model.find({ isActive: true }).select({ countryCode: 1 }).lean<Pick<InternationalRate, 'countryCode'>[]>().exec();
    return matchCountryCode(destination, rows);
  }
}
