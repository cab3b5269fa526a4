import type {
  CompetitionRecord,
  DatasetRecord,
  FileRecord,
  ModelRecord,
} from '../../src/platform/types.js';

/**
 * Platform records shaped like the REST client's output.
 * Dates are chosen relative to REPORT_NOW for the report tests.
 */
export const REPORT_NOW = new Date('2026-10-25T00:00:00.000Z');

export function sampleCompetitions(): CompetitionRecord[] {
  return [
    {
      id: 3136,
      ref: 'titanic',
      title: 'Titanic - Machine Learning from Disaster',
      url: 'https://www.kaggle.com/competitions/titanic',
      description: 'Predict survival on the Titanic',
      category: 'Getting Started',
      reward: 'Knowledge',
      deadline: new Date('2030-01-01T00:00:00.000Z'),
      enabledDate: new Date('2012-09-28T00:00:00.000Z'),
      evaluationEndDate: null,
      maxTeamSize: 5,
      evaluationMetric: 'Categorization Accuracy',
      totalTeams: 15000,
      userHasEntered: false,
      tags: ['tabular', 'binary classification'],
    },
    {
      id: 9001,
      ref: 'ocean-forecast',
      title: 'Ocean Forecast Challenge',
      category: 'Featured',
      reward: '$50,000 Usd',
      deadline: new Date('2026-11-01T00:00:00.000Z'),
      totalTeams: 420,
    },
    {
      id: 9002,
      ref: 'protein-sprint',
      title: 'Protein Folding Sprint',
      url: 'https://www.kaggle.com/competitions/protein-sprint',
      category: 'Research',
      reward: '$25,000 Usd',
      deadline: new Date('2026-12-14T12:00:00.000Z'),
      totalTeams: 75,
    },
    {
      id: 8000,
      ref: 'past-challenge',
      title: 'Past Challenge',
      url: 'https://www.kaggle.com/competitions/past-challenge',
      category: 'Featured',
      reward: '$1,000 Usd',
      deadline: new Date('2026-01-01T00:00:00.000Z'),
      totalTeams: 10,
    },
  ];
}

export function sampleDatasets(): DatasetRecord[] {
  return [
    {
      ref: 'alice/titanic',
      title: 'Titanic Passengers',
      subtitle: 'Passenger manifest with survival labels',
      description: 'A cleaned passenger list.',
      size: 61194,
      lastUpdated: new Date('2026-05-01T10:00:00.000Z'),
      downloadCount: 1200,
      voteCount: 88,
      usabilityRating: 9.5,
      licenseName: 'CC0-1.0',
      tags: [],
    },
    {
      ref: 'bob/weather',
      title: 'City Weather',
      size: '2MB',
      lastUpdated: null,
      downloadCount: 300,
      voteCount: 12,
      usabilityRating: 7.5,
      licenseName: 'CC0-1.0',
      url: 'https://www.kaggle.com/datasets/bob/weather',
    },
    {
      ref: 'carol/stocks',
      title: 'Daily Stocks',
      size: 0,
      downloadCount: 50,
      voteCount: 3,
      licenseName: 'MIT',
    },
  ];
}

export function sampleDatasetFiles(): Record<string, FileRecord[]> {
  return {
    'alice/titanic': [
      { name: 'train.csv', size: 61194, creationDate: new Date('2026-05-01T10:00:00.000Z') },
      { name: 'test.csv', size: 28629, creationDate: null },
    ],
  };
}

export function sampleModels(): ModelRecord[] {
  return [
    {
      ref: 'google/gemma',
      title: 'Gemma',
      subtitle: 'Lightweight open models',
      author: 'google',
      slug: 'gemma',
      isPrivate: false,
      publishTime: new Date('2024-02-21T00:00:00.000Z'),
      url: 'https://www.kaggle.com/models/google/gemma',
    },
    {
      ref: 'dana/tiny-net',
      title: 'Tiny Net',
      author: 'dana',
      slug: 'tiny-net',
      isPrivate: false,
      publishTime: null,
    },
  ];
}
