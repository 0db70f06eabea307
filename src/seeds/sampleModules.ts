import { IModule } from '../models/Module';

const SAMPLE_VIDEO = 'https://samplelib.com/lib/preview/mp4/sample-5s.mp4';
const SAMPLE_PDF = 'https://www.w3.org/WAI/ER/tests/xhtml/testfiles/resources/pdf/dummy.pdf';

// Demo content inserted by POST /api/seed into an empty "module" collection
export const sampleModules: IModule[] = [
  {
    title: 'Classroom Management: Routines that Work',
    description: 'Establishing smooth routines to reduce disruptions.',
    video_url: SAMPLE_VIDEO,
    thumbnail_url:
      'https://images.unsplash.com/photo-1529070538774-1843cb3265df?w=1200&q=80&auto=format&fit=crop',
    category: 'Classroom',
    timestamps: [
      { label: 'Overview', time: 5 },
      { label: 'Entry Routine', time: 20 },
      { label: 'Transitions', time: 40 },
    ],
    resources: [{ label: 'Routine Checklist (PDF)', url: SAMPLE_PDF, type: 'pdf' }],
  },
  {
    title: 'Differentiation: Tiered Tasks',
    description: 'Design assignments that meet students where they are.',
    video_url: SAMPLE_VIDEO,
    thumbnail_url:
      'https://images.unsplash.com/photo-1509062522246-3755977927d7?w=1200&q=80&auto=format&fit=crop',
    category: 'Instruction',
    timestamps: [
      { label: 'Why Tiering', time: 6 },
      { label: 'Examples', time: 18 },
    ],
    resources: [
      { label: 'Tiered Task Templates', url: 'https://www.africau.edu/images/default/sample.pdf', type: 'pdf' },
    ],
  },
  {
    title: 'Assessment: Quick Formative Checks',
    description: 'Gather real-time data to adjust instruction.',
    video_url: SAMPLE_VIDEO,
    thumbnail_url:
      'https://images.unsplash.com/photo-1523580846011-d3a5bc25702b?w=1200&q=80&auto=format&fit=crop',
    category: 'Assessment',
    timestamps: [
      { label: 'Entry Tickets', time: 8 },
      { label: 'Exit Tickets', time: 16 },
    ],
    resources: [{ label: 'Formative Check Bank', url: SAMPLE_PDF, type: 'pdf' }],
  },
];
