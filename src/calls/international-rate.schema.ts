// src/calls/international-rate.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type InternationalRateDocument = HydratedDocument<InternationalRate>;

@Schema({ collection: 'international_rates', timestamps: true })
export class InternationalRate {
  // dialling prefix including the plus, e.g. "+91"
  @Prop({ type: String, required: true, unique: true })
  countryCode!: string;

  @Prop({ type: String, required: true })
  countryName!: string;

  // USD
  @Prop({ type: Number, required: true, min: 0 })
  ratePerMinute!: number;

  @Prop({ type: Boolean, default: true, index: true })
  isActive!: boolean;
}

export const InternationalRateSchema = SchemaFactory.createForClass(InternationalRate);
