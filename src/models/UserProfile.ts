import mongoose, { Schema } from "mongoose";
import { SUBSCRIPTION_STATUSES, SubscriptionStatus } from "../types/domain";

export interface IUserProfile {
  phone: string;
  firstName?: string | null;
  location?: string | null;
  onboardingStep: number;
  onboardingCompleted: boolean;
  billingCustomerId?: string | null;
  subscriptionStatus: SubscriptionStatus;
  subscriptionId?: string | null;
  trialEnd?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const UserProfileSchema = new Schema<IUserProfile>(
  {
    // Canonical E.164 key (see utils/phone)
    phone: { type: String, required: true, unique: true },
    firstName: { type: String, default: null, trim: true },
    location: { type: String, default: null, trim: true },
    onboardingStep: { type: Number, default: 1 },
    onboardingCompleted: { type: Boolean, default: false },
    billingCustomerId: { type: String, default: null },
    subscriptionStatus: {
      type: String,
      enum: SUBSCRIPTION_STATUSES,
      default: "inactive",
    },
    subscriptionId: { type: String, default: null },
    trialEnd: { type: Date, default: null },
  },
  { timestamps: true }
);

UserProfileSchema.index({ billingCustomerId: 1 });
UserProfileSchema.index({ subscriptionStatus: 1 });

export const UserProfile = mongoose.model<IUserProfile>("UserProfile", UserProfileSchema);
export default UserProfile;
