import mongoose, { Schema } from "mongoose";

/**
 * Rolling 30-day outbound counter. `periodStart` is the UTC midnight of the
 * day the window opened, not a calendar month boundary.
 */
export interface IMonthlySmsUsage {
  phone: string;
  periodStart: Date;
  periodEnd: Date;
  messageCount: number;
  quotaWarningsSent: number;
  quotaExceeded: boolean;
}

const MonthlySmsUsageSchema = new Schema<IMonthlySmsUsage>(
  {
    phone: { type: String, required: true },
    periodStart: { type: Date, required: true },
    periodEnd: { type: Date, required: true },
    messageCount: { type: Number, default: 0 },
    quotaWarningsSent: { type: Number, default: 0 },
    quotaExceeded: { type: Boolean, default: false },
  },
  { timestamps: true }
);

MonthlySmsUsageSchema.index({ phone: 1, periodStart: 1 }, { unique: true });
MonthlySmsUsageSchema.index({ phone: 1, periodEnd: -1 });

export const MonthlySmsUsage = mongoose.model<IMonthlySmsUsage>("MonthlySmsUsage", MonthlySmsUsageSchema);
export default MonthlySmsUsage;
