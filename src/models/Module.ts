import mongoose, { Model, Schema } from 'mongoose';

export interface ITimestamp {
  label: string;
  time: number; // seconds from the start of the video
}

export interface IResource {
  label: string;
  url: string;
  type: string | null; // "pdf", "slides", "doc", "other"... not enforced
}

export interface IModule {
  title: string;
  description: string | null;
  video_url: string;
  thumbnail_url: string | null;
  category: string | null;
  timestamps: ITimestamp[];
  resources: IResource[];
}

// Body of POST /api/modules once it has passed moduleValidation.create
export interface ModuleInput {
  title: string;
  description?: string | null;
  video_url: string;
  thumbnail_url?: string | null;
  category?: string | null;
  timestamps?: ITimestamp[];
  resources?: Array<{ label: string; url: string; type?: string | null }>;
}

export const toModuleRecord = (input: ModuleInput): IModule => ({
  title: input.title,
  description: input.description ?? null,
  video_url: input.video_url,
  thumbnail_url: input.thumbnail_url ?? null,
  category: input.category ?? null,
  timestamps: (input.timestamps ?? []).map(({ label, time }) => ({ label, time })),
  resources: (input.resources ?? []).map(({ label, url, type }) => ({
    label,
    url,
    type: type ?? null,
  })),
});

const timestampSchema = new Schema<ITimestamp>(
  {
    label: { type: String, required: true },
    time: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const resourceSchema = new Schema<IResource>(
  {
    label: { type: String, required: true },
    url: { type: String, required: true },
    type: { type: String, default: null },
  },
  { _id: false }
);

const moduleSchema = new Schema<IModule>(
  {
    title: { type: String, required: [true, 'Module title is required'] },
    description: { type: String, default: null },
    video_url: { type: String, required: [true, 'Video URL is required'] },
    thumbnail_url: { type: String, default: null },
    category: { type: String, default: null },

    // Order is meaningful: chronological jump points
    timestamps: { type: [timestampSchema], default: [] },
    resources: { type: [resourceSchema], default: [] },
  },
  { collection: 'module', versionKey: false }
);

export const Module: Model<IModule> = mongoose.model<IModule>('Module', moduleSchema);
