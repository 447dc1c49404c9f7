import mongoose, { Schema } from "mongoose";
import { DeliveryCategory } from "../types/domain";

export interface ISmsDeliveryLog {
  phone: string;
  body: string;
  category: DeliveryCategory;
  status: string;
  providerMessageId?: string | null;
  error?: string | null;
  createdAt: Date;
}

const SmsDeliveryLogSchema = new Schema<ISmsDeliveryLog>(
  {
    phone: { type: String, required: true },
    body: { type: String, required: true },
    category: { type: String, enum: ["reply", "system"], required: true },
    status: { type: String, required: true },
    providerMessageId: { type: String, default: null },
    error: { type: String, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

SmsDeliveryLogSchema.index({ phone: 1, createdAt: -1 });
SmsDeliveryLogSchema.index(
  { createdAt: 1 },
  { expireAfterSeconds: 90 * 24 * 60 * 60 } // keep 90 days
);

export const SmsDeliveryLog = mongoose.model<ISmsDeliveryLog>("SmsDeliveryLog", SmsDeliveryLogSchema);
export default SmsDeliveryLog;
