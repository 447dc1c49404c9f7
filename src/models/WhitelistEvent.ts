import mongoose, { Schema } from "mongoose";
import { WhitelistAction, WhitelistSource } from "../types/domain";
import { WHITELIST_SOURCES } from "./WhitelistEntry";

export interface IWhitelistEvent {
  phone: string;
  action: WhitelistAction;
  source: WhitelistSource;
  createdAt: Date;
}

const WhitelistEventSchema = new Schema<IWhitelistEvent>(
  {
    phone: { type: String, required: true },
    action: { type: String, enum: ["added", "removed"], required: true },
    source: { type: String, enum: WHITELIST_SOURCES, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

WhitelistEventSchema.index({ phone: 1, createdAt: -1 });

export const WhitelistEvent = mongoose.model<IWhitelistEvent>("WhitelistEvent", WhitelistEventSchema);
export default WhitelistEvent;
