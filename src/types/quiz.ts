export type QuestionType = 'definition' | 'synonym' | 'antonym';

export type QuestionCounts = Record<QuestionType, number>;

export interface WordEntry {
  word: string;
  definition: string;
  partOfSpeech: string;
  synonyms: string[];
  antonyms: string[];
  // Only field that changes during a session
  repetition: number;
}

export interface Question {
  readonly word: string;
  readonly type: QuestionType;
  readonly correctAnswer: string;
  readonly partOfSpeech: string;
}

export interface AnswerRecord {
  readonly word: string;
  readonly isCorrect: boolean;
  readonly userChoice: string;
  readonly correctAnswer: string;
  readonly questionType: QuestionType;
}

export type SessionStatus = 'not-started' | 'in-progress' | 'completed';

export type SaveStatus = 'idle' | 'saving' | 'saved' | 'failed' | 'local-only';

export interface QuestionView {
  word: string;
  type: QuestionType;
  prompt: string;
}

export interface SessionSnapshot {
  id: string;
  status: SessionStatus;
  questionNumber: number;
  totalQuestions: number;
  question: QuestionView | null;
  options: string[];
  selectedOption: string | null;
  submitted: boolean;
  lastAnswer: AnswerRecord | null;
  score: number;
  saveStatus: SaveStatus;
  warnings: string[];
}

export interface RepetitionBucket {
  repetition: number;
  count: number;
}

export interface ReviewItem {
  word: string;
  definition: string;
  partOfSpeech: string;
  synonyms: string[];
  antonyms: string[];
  questionType: QuestionType;
  userChoice: string;
  correctAnswer: string;
}

export interface QuizSummary {
  score: number;
  totalQuestions: number;
  repetitionHistogram: RepetitionBucket[];
  masteredWords: number;
  totalWords: number;
  correctList: ReviewItem[];
  incorrectList: ReviewItem[];
}
