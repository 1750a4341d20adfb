import mongoose, { Schema } from 'mongoose';

export interface IInteraction {
  interactionId: string;
  userId: string;
  timestamp: Date;
  userMessage: string;
  sentiment: string;
  stressLevel: string;
  emotions: string[];
  strategyType: string;
  crisisScore: number;
  document: string;
  embedding: number[];
  createdAt: Date;
  updatedAt: Date;
}

const InteractionSchema = new Schema<IInteraction>(
  {
    interactionId: {
      type: String,
      required: true,
      unique: true,
    },
    userId: {
      type: String,
      required: true,
      index: true,
    },
    timestamp: {
      type: Date,
      required: true,
      default: Date.now,
      index: true,
    },
    userMessage: {
      type: String,
      required: true,
    },
    sentiment: {
      type: String,
      required: true,
      default: 'neutral',
    },
    stressLevel: {
      type: String,
      required: true,
      default: 'medium',
    },
    emotions: {
      type: [String],
      default: [],
    },
    strategyType: {
      type: String,
      default: 'unknown',
    },
    crisisScore: {
      type: Number,
      min: 0,
      max: 1,
      default: 0,
    },
    document: {
      type: String,
      required: true,
    },
    embedding: {
      type: [Number],
      default: [],
    },
  },
  {
    timestamps: true,
  }
);

// Most queries are "latest interactions for one user"
InteractionSchema.index({ userId: 1, timestamp: -1 });

export const InteractionModel = mongoose.model<IInteraction>('Interaction', InteractionSchema);
