'use client';

import { useCallback, useState } from 'react';
import { QuizQuestion } from '@/app/components/QuizQuestion';
import { QuizResults } from '@/app/components/QuizResults';
import type { QuizSummary, SessionSnapshot } from '@/types/quiz';
import { logger } from '@/libs/utils/logger';

interface SessionResponse {
  session: SessionSnapshot;
}

interface SummaryResponse {
  summary: QuizSummary;
}

async function callQuizApi<T>(path: string, init?: RequestInit): Promise<T> {
  const response = await fetch(`/api/quiz${path}`, {
    headers: { 'Content-Type': 'application/json' },
    ...init
  });
  const data = await response.json();
  if (!response.ok) {
    throw new Error(data?.error || `Request failed: ${response.status}`);
  }
  return data;
}

export default function Home() {
  const [session, setSession] = useState<SessionSnapshot | null>(null);
  const [summary, setSummary] = useState<QuizSummary | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [busy, setBusy] = useState(false);

  const run = useCallback(async (action: () => Promise<void>) => {
    setBusy(true);
    setError(null);
    try {
      await action();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error('Quiz request failed:', message);
      setError(message);
    } finally {
      setBusy(false);
    }
  }, []);

  const applySession = useCallback(async (next: SessionSnapshot) => {
    setSession(next);
    if (next.status === 'completed') {
      const data = await callQuizApi<SummaryResponse>(`/${next.id}/summary`);
      setSummary(data.summary);
    } else {
      setSummary(null);
    }
  }, []);

  const startQuiz = () => run(async () => {
    // A restarted session keeps its words; otherwise a new one is created
    const data = session?.status === 'not-started'
      ? await callQuizApi<SessionResponse>(`/${session.id}/start`, { method: 'POST' })
      : await callQuizApi<SessionResponse>('', { method: 'POST' });
    await applySession(data.session);
  });

  const selectOption = (option: string) => {
    if (!session) return;
    // Reflect the choice immediately; the server copy follows
    setSession({ ...session, selectedOption: option });
    void run(async () => {
      const data = await callQuizApi<SessionResponse>(`/${session.id}/select`, {
        method: 'POST',
        body: JSON.stringify({ choice: option })
      });
      setSession(data.session);
    });
  };

  const submitAnswer = () => run(async () => {
    if (!session?.selectedOption) return;
    const data = await callQuizApi<SessionResponse>(`/${session.id}/submit`, {
      method: 'POST',
      body: JSON.stringify({ choice: session.selectedOption })
    });
    setSession(data.session);
  });

  const nextQuestion = () => run(async () => {
    if (!session) return;
    const data = await callQuizApi<SessionResponse>(`/${session.id}/advance`, { method: 'POST' });
    await applySession(data.session);
  });

  const restartQuiz = () => run(async () => {
    if (!session) return;
    const data = await callQuizApi<SessionResponse>(`/${session.id}/restart`, { method: 'POST' });
    await applySession(data.session);
  });

  const showStart = !session || session.status === 'not-started';

  return (
    <main className="container mx-auto px-4 py-8 max-w-2xl space-y-6">
      <h1 className="text-3xl font-bold text-gray-900 text-center">11+ Vocabulary Quiz</h1>

      {error && (
        <div className="p-3 rounded-lg bg-red-50 border border-red-200 text-red-800 text-sm">
          {error}
        </div>
      )}

      {showStart && (
        <div className="text-center py-12 space-y-6">
          <p className="text-lg text-gray-700">Click below to start the quiz!</p>
          <button
            onClick={() => void startQuiz()}
            disabled={busy}
            className="px-8 py-4 bg-blue-600 text-white text-lg font-semibold rounded-lg hover:bg-blue-700 disabled:opacity-50 transition-colors cursor-pointer"
          >
            {busy ? 'Preparing…' : 'Start Quiz'}
          </button>
        </div>
      )}

      {session?.status === 'in-progress' && session.question && (
        <>
          <div className="text-sm text-gray-600 text-right">Score: {session.score}</div>
          <QuizQuestion
            question={session.question}
            questionNumber={session.questionNumber}
            totalQuestions={session.totalQuestions}
            options={session.options}
            selectedOption={session.selectedOption}
            submitted={session.submitted}
            lastAnswer={session.lastAnswer}
            busy={busy}
            onSelect={selectOption}
            onSubmit={() => void submitAnswer()}
            onNext={() => void nextQuestion()}
          />
        </>
      )}

      {session?.status === 'completed' && summary && (
        <QuizResults
          summary={summary}
          saveStatus={session.saveStatus}
          warnings={session.warnings}
          onRestart={() => void restartQuiz()}
        />
      )}
    </main>
  );
}
