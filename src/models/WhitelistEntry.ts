import mongoose, { Schema } from "mongoose";
import { WhitelistSource } from "../types/domain";

export const WHITELIST_SOURCES: WhitelistSource[] = [
  "manual",
  "system",
  "admin",
  "legacy_migration",
  "stripe_subscription",
  "stripe_payment",
  "stripe_cancellation",
];

export interface IWhitelistEntry {
  phone: string;
  isActive: boolean;
  addedBy: WhitelistSource;
  addedAt: Date;
  removedBy?: WhitelistSource | null;
  removedAt?: Date | null;
}

/**
 * One row per phone. Rows are flipped between active and inactive,
 * never deleted; the unique index on phone is what makes
 * "insert unless already active" safe to race.
 */
const WhitelistEntrySchema = new Schema<IWhitelistEntry>(
  {
    phone: { type: String, required: true, unique: true },
    isActive: { type: Boolean, default: true },
    addedBy: { type: String, enum: WHITELIST_SOURCES, required: true },
    addedAt: { type: Date, required: true },
    removedBy: { type: String, enum: WHITELIST_SOURCES, default: null },
    removedAt: { type: Date, default: null },
  },
  { timestamps: true }
);

WhitelistEntrySchema.index({ isActive: 1 });

export const WhitelistEntry = mongoose.model<IWhitelistEntry>("WhitelistEntry", WhitelistEntrySchema);
export default WhitelistEntry;
