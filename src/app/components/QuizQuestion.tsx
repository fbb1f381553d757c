'use client';

import type { AnswerRecord, QuestionView } from '@/types/quiz';

interface QuizQuestionProps {
  question: QuestionView;
  questionNumber: number;
  totalQuestions: number;
  options: string[];
  selectedOption: string | null;
  submitted: boolean;
  lastAnswer: AnswerRecord | null;
  busy: boolean;
  onSelect: (option: string) => void;
  onSubmit: () => void;
  onNext: () => void;
}

export function QuizQuestion({
  question,
  questionNumber,
  totalQuestions,
  options,
  selectedOption,
  submitted,
  lastAnswer,
  busy,
  onSelect,
  onSubmit,
  onNext
}: QuizQuestionProps) {
  const getOptionStyle = (option: string) => {
    if (!submitted || !lastAnswer) {
      return option === selectedOption
        ? "w-full p-4 text-left border-2 border-blue-500 bg-blue-50 rounded-lg cursor-pointer"
        : "w-full p-4 text-left border border-gray-300 rounded-lg hover:bg-gray-50 hover:border-gray-400 transition-colors cursor-pointer";
    }

    if (option === lastAnswer.correctAnswer) {
      return "w-full p-4 text-left border-2 border-green-500 bg-green-50 rounded-lg";
    }

    if (option === lastAnswer.userChoice) {
      return "w-full p-4 text-left border-2 border-red-500 bg-red-50 rounded-lg";
    }

    return "w-full p-4 text-left border border-gray-300 rounded-lg bg-gray-50";
  };

  return (
    <div className="space-y-6">
      {/* Question Header */}
      <div className="text-center">
        <p className="text-sm text-gray-500 mb-2">
          Question {questionNumber}/{totalQuestions}
        </p>
        <h2 className="text-2xl font-bold text-gray-900">
          {question.prompt}
        </h2>
      </div>

      {/* Options */}
      <div className="space-y-3">
        {options.map((option, index) => (
          <button
            key={option}
            onClick={() => onSelect(option)}
            disabled={submitted || busy}
            className={getOptionStyle(option)}
          >
            <div className="flex items-start space-x-3">
              <span className="font-medium text-gray-700">
                {String.fromCharCode(65 + index)}.
              </span>
              <p className="text-gray-800 leading-relaxed">{option}</p>
            </div>
          </button>
        ))}
      </div>

      {!submitted && (
        <div className="text-center">
          <button
            onClick={onSubmit}
            disabled={selectedOption === null || busy}
            className="bg-blue-600 text-white px-6 py-3 rounded-lg hover:bg-blue-700 disabled:opacity-50 disabled:cursor-not-allowed transition-colors font-medium cursor-pointer"
          >
            Submit
          </button>
        </div>
      )}

      {/* Result Section */}
      {submitted && lastAnswer && (
        <div className="space-y-4">
          <div className={`p-4 rounded-lg ${
            lastAnswer.isCorrect
              ? 'bg-green-50 border border-green-200'
              : 'bg-red-50 border border-red-200'
          }`}>
            <h3 className={`text-lg font-semibold ${lastAnswer.isCorrect ? 'text-green-800' : 'text-red-800'}`}>
              {lastAnswer.isCorrect ? 'Correct! ✅' : `Wrong! The answer is: ${lastAnswer.correctAnswer}`}
            </h3>
          </div>

          <div className="text-center">
            <button
              onClick={onNext}
              disabled={busy}
              className="bg-blue-600 text-white px-6 py-3 rounded-lg hover:bg-blue-700 disabled:opacity-50 transition-colors font-medium cursor-pointer"
            >
              {questionNumber === totalQuestions ? 'See Results' : 'Next Question'}
            </button>
          </div>
        </div>
      )}
    </div>
  );
}
