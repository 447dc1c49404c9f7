import mongoose, { Schema } from "mongoose";
import { MessageDirection, QueryIntent } from "../types/domain";

export interface IMessage {
  phone: string;
  direction: MessageDirection;
  body: string;
  intent?: QueryIntent | null;
  responseTimeMs: number;
  createdAt: Date;
}

const MessageSchema = new Schema<IMessage>(
  {
    phone: { type: String, required: true },
    direction: { type: String, enum: ["inbound", "outbound"], required: true },
    body: { type: String, required: true },
    intent: { type: String, default: null },
    responseTimeMs: { type: Number, default: 0 },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

MessageSchema.index({ phone: 1, createdAt: -1 });

export const Message = mongoose.model<IMessage>("Message", MessageSchema);
export default Message;
