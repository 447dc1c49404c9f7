import mongoose, { Schema } from "mongoose";
import { QueryIntent } from "../types/domain";

export interface IUsageAnalytics {
  phone: string;
  intent: QueryIntent;
  responseTimeMs: number;
  success: boolean;
  createdAt: Date;
}

const UsageAnalyticsSchema = new Schema<IUsageAnalytics>(
  {
    phone: { type: String, required: true },
    intent: {
      type: String,
      enum: ["sports_schedule", "business_hours", "weather", "general", "error"],
      required: true,
    },
    responseTimeMs: { type: Number, default: 0 },
    success: { type: Boolean, default: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

UsageAnalyticsSchema.index({ intent: 1, createdAt: -1 });
UsageAnalyticsSchema.index({ phone: 1, createdAt: -1 });

export const UsageAnalytics = mongoose.model<IUsageAnalytics>("UsageAnalytics", UsageAnalyticsSchema);
export default UsageAnalytics;
