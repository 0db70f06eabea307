import mongoose, { Model, Schema } from 'mongoose';

export interface INote {
  user_id: string;
  module_id: string;
  content: string;
}

export type NoteInput = Pick<INote, 'user_id' | 'module_id'> & Partial<Pick<INote, 'content'>>;

export const defaultNote = (user_id: string, module_id: string): INote => ({
  user_id,
  module_id,
  content: '',
});

export const toNoteRecord = (input: NoteInput): INote => ({
  user_id: input.user_id,
  module_id: input.module_id,
  content: input.content ?? '',
});

const noteSchema = new Schema<INote>(
  {
    user_id: { type: String, required: true },
    module_id: { type: String, required: true },
    content: { type: String, default: '' },
  },
  { collection: 'note', versionKey: false }
);

noteSchema.index({ user_id: 1, module_id: 1 }, { unique: true });

export const Note: Model<INote> = mongoose.model<INote>('Note', noteSchema);
