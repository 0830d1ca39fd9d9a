export interface StoryboardFrame {
  sceneIndex: number;
  label: string;
  heading: string;
  description: string;
  cameraAngle: string;
  cameraMovement: string;
  characters: string[];
  notes: string;
  /** Relative to the storyboard's output directory. */
  imagePath?: string;
}

export interface Storyboard {
  title: string;
  generatedAt: string;
  frames: StoryboardFrame[];
}

export const STORYBOARD_FORMATS = ['html', 'json', 'markdown', 'pdf', 'all'] as const;
export type StoryboardFormat = typeof STORYBOARD_FORMATS[number];

export function isStoryboardFormat(value: string): value is StoryboardFormat {
  return (STORYBOARD_FORMATS as readonly string[]).includes(value);
}
