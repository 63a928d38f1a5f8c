import { Schema, model } from "mongoose";

const TranslationExchangeSchema = new Schema(
  {
    job_id: { type: String, required: true, index: true },
    document_id: { type: String, required: true, index: true },
    sequence: { type: Number, required: true },
    task_id: { type: String, required: true },
    variant: {
      type: String,
      enum: ["batch", "split", "fix"],
      required: true,
    },
    round: { type: Number, required: true },
    attempt: { type: Number, required: true },
    status: { type: String, enum: ["ok", "error"], required: true },
    raw_response: { type: String, default: null },
    error: { type: String, default: null },
    model: { type: String, default: null },
    completed_at: { type: Date, required: true },
  },
  {
    collection: "translation_exchanges",
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

TranslationExchangeSchema.index({ job_id: 1, sequence: 1 }, { unique: true });

export default model("TranslationExchange", TranslationExchangeSchema);
