import type { ContentTheme, HashtagPools, ProfileDescriptor } from '../types/content.js';

export const DEFAULT_PROFILE: ProfileDescriptor = {
  name: 'Jordan Lee',
  pronouns: '(They/Them)',
  title: 'AI & Machine Learning Developer | Generative AI & Chatbot Specialist',
  skills: ['Python', 'Flask', 'Streamlit', 'Snowflake', 'Docker'],
  profileUrl: 'https://www.linkedin.com/in/jordan-lee-ai-ml-developer/',
  primaryKeywords: [
    'AI Developer',
    'Machine Learning Expert',
    'Generative AI Specialist',
    'Chatbot Developer',
    'Python Developer',
  ],
};

export const CONTENT_THEMES: readonly ContentTheme[] = [
  {
    theme: 'expertise_showcase',
    headlineEmojis: ['🚀', '💡'],
    focus: 'Technical expertise and problem-solving capabilities',
  },
  {
    theme: 'thought_leadership',
    headlineEmojis: ['🤖', '🔮'],
    focus: 'AI/ML industry insights and future trends',
  },
  {
    theme: 'solution_spotlight',
    headlineEmojis: ['⚡', '🎯'],
    focus: 'Specific solutions and case studies',
  },
  {
    theme: 'technology_deep_dive',
    headlineEmojis: ['🔍', '💻'],
    focus: 'Technical deep dives into AI/ML concepts',
  },
];

export const HASHTAG_POOLS: HashtagPools = {
  core: ['AI', 'MachineLearning', 'GenerativeAI', 'ArtificialIntelligence'],
  technical: ['PythonProgramming', 'DataScience', 'ChatbotDevelopment', 'MLOps'],
  business: ['DigitalTransformation', 'TechInnovation', 'BusinessAI', 'AIStrategy'],
  trending: ['FutureOfAI', 'AITechnology', 'TechTrends', 'Innovation'],
};

// Glyphs that get a trailing space so they render apart from the next word
export const SPACED_EMOJIS = ['🚀', '💡', '🤖', '✨', '💪', '🔍', '🎯', '⚡', '🔮', '💻', '🤝'] as const;

// Glyphs counted in the emoji metric of an audit record
export const METRIC_EMOJIS = ['🚀', '💡', '🤖', '✨', '💪', '🔍', '🤝'] as const;

export const MIN_WORDS = 150;
export const MAX_WORDS = 175;
export const TRUNCATE_TO_WORDS = 170;
