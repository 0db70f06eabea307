import mongoose, { Model, Schema } from 'mongoose';

export interface IProgress {
  user_id: string;
  module_id: string; // stringified ObjectId of the module
  last_position: number; // seconds
  completed: boolean;
}

export type ProgressInput = Pick<IProgress, 'user_id' | 'module_id'> &
  Partial<Pick<IProgress, 'last_position' | 'completed'>>;

export const defaultProgress = (user_id: string, module_id: string): IProgress => ({
  user_id,
  module_id,
  last_position: 0,
  completed: false,
});

export const toProgressRecord = (input: ProgressInput): IProgress => ({
  user_id: input.user_id,
  module_id: input.module_id,
  last_position: input.last_position ?? 0,
  completed: input.completed ?? false,
});

const progressSchema = new Schema<IProgress>(
  {
    user_id: { type: String, required: true },
    module_id: { type: String, required: true },
    last_position: { type: Number, default: 0, min: 0 },
    completed: { type: Boolean, default: false },
  },
  { collection: 'progress', versionKey: false }
);

// One progress record per user and module
progressSchema.index({ user_id: 1, module_id: 1 }, { unique: true });

export const Progress: Model<IProgress> = mongoose.model<IProgress>('Progress', progressSchema);
