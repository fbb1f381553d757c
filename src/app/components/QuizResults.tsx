'use client';

import type { QuizSummary, ReviewItem, SaveStatus } from '@/types/quiz';

interface QuizResultsProps {
  summary: QuizSummary;
  saveStatus: SaveStatus;
  warnings: string[];
  onRestart: () => void;
}

function ReviewList({ title, items, tone }: { title: string; items: ReviewItem[]; tone: 'green' | 'red' }) {
  if (items.length === 0) return null;

  return (
    <div className="space-y-2">
      <h3 className={`text-lg font-semibold ${tone === 'green' ? 'text-green-800' : 'text-red-800'}`}>
        {title} ({items.length})
      </h3>
      <ul className="space-y-2">
        {items.map((item, index) => (
          <li key={`${item.word}-${index}`} className="bg-white border rounded-lg p-3 text-sm text-gray-700">
            <div className="font-medium text-gray-900">
              {item.word} <span className="text-gray-500 italic">({item.partOfSpeech})</span>
            </div>
            <div>{item.definition}</div>
            {item.synonyms.length > 0 && <div>Synonyms: {item.synonyms.join(', ')}</div>}
            {item.antonyms.length > 0 && <div>Antonyms: {item.antonyms.join(', ')}</div>}
            {tone === 'red' && (
              <div className="mt-1 text-red-700">
                You chose &ldquo;{item.userChoice}&rdquo;, the answer was &ldquo;{item.correctAnswer}&rdquo;
              </div>
            )}
          </li>
        ))}
      </ul>
    </div>
  );
}

export function QuizResults({ summary, saveStatus, warnings, onRestart }: QuizResultsProps) {
  const percentage = summary.totalQuestions > 0
    ? Math.round((summary.score / summary.totalQuestions) * 100)
    : 0;

  const getScoreColor = () => {
    if (percentage >= 80) return "text-green-600";
    if (percentage >= 60) return "text-yellow-600";
    return "text-red-600";
  };

  return (
    <div className="space-y-6">
      <div className="text-center space-y-2">
        <h2 className="text-3xl font-bold text-gray-900">Quiz Complete!</h2>
        <div className={`text-4xl font-bold ${getScoreColor()}`}>
          Score: {summary.score}/{summary.totalQuestions}
        </div>
        {saveStatus === 'saved' && (
          <p className="text-sm text-gray-500">Progress saved.</p>
        )}
      </div>

      {warnings.map(warning => (
        <div key={warning} className="p-3 rounded-lg bg-yellow-50 border border-yellow-200 text-yellow-800 text-sm">
          {warning}
        </div>
      ))}

      {/* Progress Report */}
      <div className="bg-white rounded-lg shadow-sm border p-4">
        <h3 className="text-lg font-semibold text-gray-900 mb-1">📊 Progress Report</h3>
        <p className="text-sm text-gray-600 mb-3">Occasions correctly answered / number of words</p>
        <ul className="text-gray-800">
          {summary.repetitionHistogram.map(bucket => (
            <li key={bucket.repetition}>{bucket.repetition} / {bucket.count}</li>
          ))}
        </ul>
        <p className="mt-3 font-semibold text-green-700">
          Mastered: {summary.masteredWords}/{summary.totalWords} words
        </p>
      </div>

      <ReviewList title="Needs more practice" items={summary.incorrectList} tone="red" />
      <ReviewList title="Answered correctly" items={summary.correctList} tone="green" />

      <div className="text-center">
        <button
          onClick={onRestart}
          className="bg-blue-600 text-white py-3 px-6 rounded-lg hover:bg-blue-700 transition-colors font-medium cursor-pointer"
        >
          Restart Quiz
        </button>
      </div>
    </div>
  );
}
