import mongoose, { Schema } from "mongoose";
import { StripeEventOutcome } from "../types/domain";

export interface IStripeEventLog {
  eventId: string;
  eventType: string;
  phone?: string | null;
  customerId?: string | null;
  outcome: StripeEventOutcome;
  detail: string;
  createdAt: Date;
}

// Append-only: replays of the same Stripe event get their own row
const StripeEventLogSchema = new Schema<IStripeEventLog>(
  {
    eventId: { type: String, required: true },
    eventType: { type: String, required: true },
    phone: { type: String, default: null },
    customerId: { type: String, default: null },
    outcome: {
      type: String,
      enum: ["processed", "no_phone", "error", "ignored"],
      required: true,
    },
    detail: { type: String, default: "" },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

StripeEventLogSchema.index({ eventId: 1 });
StripeEventLogSchema.index({ createdAt: -1 });

export const StripeEventLog = mongoose.model<IStripeEventLog>("StripeEventLog", StripeEventLogSchema);
export default StripeEventLog;
