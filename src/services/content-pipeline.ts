import type { LLMService } from './llm-service.js';
import type { ContentTheme, HashtagPools, ProfileDescriptor } from '../types/content.js';
import { mathRandom, pickOne, sample, type RandomSource } from '../utils/random.js';
import {
  CONTENT_THEMES,
  DEFAULT_PROFILE,
  HASHTAG_POOLS,
  MAX_WORDS,
  MIN_WORDS,
  SPACED_EMOJIS,
  TRUNCATE_TO_WORDS,
} from './content-defaults.js';

export interface ContentPipelineOptions {
  llm: LLMService;
  profile?: ProfileDescriptor;
  themes?: readonly ContentTheme[];
  hashtagPools?: HashtagPools;
  random?: RandomSource;
}

const URL_PATTERN = /http\S+|www.\S+/g;
const HASHTAG_PATTERN = /#[\p{L}\p{N}_]+/gu;

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Words that count towards the length band: URLs and hashtags are dropped
 */
export function countWords(content: string): number {
  const withoutUrls = content.replace(URL_PATTERN, '');
  const withoutHashtags = withoutUrls.replace(HASHTAG_PATTERN, '');
  return tokenize(withoutHashtags).length;
}

/**
 * Turns profile data and a random theme into publishable post text.
 * Generation errors are not caught here; the orchestrator owns retries.
 */
export class ContentPipeline {
  private llm: LLMService;
  private profile: ProfileDescriptor;
  private themes: readonly ContentTheme[];
  private hashtagPools: HashtagPools;
  private random: RandomSource;

  constructor(options: ContentPipelineOptions) {
    this.llm = options.llm;
    this.profile = options.profile ?? DEFAULT_PROFILE;
    this.themes = options.themes ?? CONTENT_THEMES;
    this.hashtagPools = options.hashtagPools ?? HASHTAG_POOLS;
    this.random = options.random ?? mathRandom;
  }

  getProfile(): ProfileDescriptor {
    return this.profile;
  }

  selectTheme(): ContentTheme {
    return pickOne(this.themes, this.random);
  }

  /**
   * 2 core + 2 technical + 1 business + 1 trending, no repeats
   */
  sampleHashtags(): string[] {
    return [
      ...sample(this.hashtagPools.core, 2, this.random),
      ...sample(this.hashtagPools.technical, 2, this.random),
      ...sample(this.hashtagPools.business, 1, this.random),
      ...sample(this.hashtagPools.trending, 1, this.random),
    ];
  }

  buildPrompt(theme: ContentTheme): string {
    const { name, pronouns, title, skills, profileUrl, primaryKeywords } = this.profile;
    const keyword = pickOne(primaryKeywords, this.random);

    return `Create a concise LinkedIn post for a ${title}. The post MUST be between ${MIN_WORDS}-${MAX_WORDS} words total.

Profile Context:
- Name: ${name} ${pronouns}
- Role: ${title}
- Key Skills: ${skills.join(', ')}

Content Theme: ${theme.focus}

Structure Requirements:

1. Headline (with ${theme.headlineEmojis[0]}):
- Include keyword: ${keyword}
- Keep under 15 words

2. Introduction (2 short paragraphs):
- First paragraph: Core message (25-30 words)
- Second paragraph: Value proposition (25-30 words)
- Mention ${skills[0] ?? 'your core skill'} and ${skills[1] ?? 'your favourite tool'}

3. Key Points (2-3 bullet points):
- Use ✨, 💪, 🔍
- Each point 15-20 words
- Focus on outcomes

4. Call-to-Action:
- Short networking invitation
- End with 🤝
- Profile URL on new line "${profileUrl}"

Important:
- Total word count must be ${MIN_WORDS}-${MAX_WORDS} words
- Use concise, impactful language
- Avoid repetition`;
  }

  async generate(prompt: string): Promise<string> {
    return this.llm.generate(prompt);
  }

  /**
   * Pick a theme, build its prompt and ask the model for a draft
   */
  async generatePostContent(): Promise<{ theme: ContentTheme; content: string }> {
    const theme = this.selectTheme();
    const content = await this.generate(this.buildPrompt(theme));
    return { theme, content };
  }

  format(raw: string): string {
    const { profileUrl } = this.profile;
    const sections: string[] = [];

    for (const section of raw.split('\n\n')) {
      if (!section.trim()) continue;

      let clean = section.replaceAll('**', '').replaceAll('*', '').trim();

      // Model-written hashtags are always replaced by a sampled set
      if (clean.startsWith('#')) {
        clean = this.sampleHashtags()
          .map((tag) => `#${tag}`)
          .join(' ');
      }

      for (const emoji of SPACED_EMOJIS) {
        clean = clean.replaceAll(emoji, `${emoji} `);
      }

      sections.push(clean);
    }

    let formatted = sections.join('\n\n');
    if (formatted.includes(profileUrl)) {
      formatted = formatted.replaceAll(profileUrl, `\n${profileUrl}`);
    }

    const words = tokenize(formatted);
    if (words.length > MAX_WORDS) {
      formatted = words.slice(0, TRUNCATE_TO_WORDS).join(' ') + '...';
      formatted += `\n\n${profileUrl}`;
    }

    return formatted.trim();
  }

  validateLength(content: string): boolean {
    const count = countWords(content);
    return count >= MIN_WORDS && count <= MAX_WORDS;
  }

  /**
   * Percentage of lower-cased tokens containing each primary keyword.
   * Containment is substring based, so multi-word keywords never match a
   * single token.
   */
  keywordDensity(content: string): Record<string, number> {
    return keywordDensity(content, this.profile.primaryKeywords);
  }
}

/**
 * Round to `decimals` places, sending exact ties to the even neighbour
 * (0.625 -> 0.62, 0.635 -> 0.64).
 */
export function roundHalfEven(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (diff > 0.5) {
    rounded = floor + 1;
  } else if (diff < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  return rounded / factor;
}

export function keywordDensity(content: string, keywords: readonly string[]): Record<string, number> {
  const tokens = tokenize(content.toLowerCase());
  const total = tokens.length;
  const density: Record<string, number> = {};

  for (const keyword of keywords) {
    const needle = keyword.toLowerCase();
    const hits = tokens.filter((token) => token.includes(needle)).length;
    const percentage = total > 0 ? (hits / total) * 100 : 0;
    density[keyword] = roundHalfEven(percentage);
  }

  return density;
}
