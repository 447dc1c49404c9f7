import mongoose, { Schema } from "mongoose";
import { OnboardingField } from "../types/domain";

export interface IOnboardingLog {
  phone: string;
  step: number;
  field: OnboardingField;
  value: string;
  createdAt: Date;
}

const OnboardingLogSchema = new Schema<IOnboardingLog>(
  {
    phone: { type: String, required: true },
    step: { type: Number, required: true },
    field: { type: String, enum: ["first_name", "location"], required: true },
    value: { type: String, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

OnboardingLogSchema.index({ phone: 1, createdAt: -1 });

export const OnboardingLog = mongoose.model<IOnboardingLog>("OnboardingLog", OnboardingLogSchema);
export default OnboardingLog;
