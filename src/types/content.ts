export interface ProfileDescriptor {
  readonly name: string;
  readonly pronouns: string;
  readonly title: string;
  readonly skills: readonly string[];
  readonly profileUrl: string;
  readonly primaryKeywords: readonly string[];
}

export type ThemeId =
  | 'expertise_showcase'
  | 'thought_leadership'
  | 'solution_spotlight'
  | 'technology_deep_dive';

export interface ContentTheme {
  readonly theme: ThemeId;
  readonly headlineEmojis: readonly [string, string];
  readonly focus: string;
}

export interface HashtagPools {
  readonly core: readonly string[];
  readonly technical: readonly string[];
  readonly business: readonly string[];
  readonly trending: readonly string[];
}
