import { observer } from "mobx-react-lite";
import type React from "react";
import type { ReaderSessionStore } from "../stores/ReaderSessionStore";

interface AiAnswerPanelProps {
  session: ReaderSessionStore;
  onClose?: () => void;
}

export const AiAnswerPanel: React.FC<AiAnswerPanelProps> = observer(
  ({ session, onClose }: AiAnswerPanelProps) => {
    const { answer } = session;

    return (
      <section aria-label="AI answer" className="flex flex-col gap-2 p-3">
        <header className="flex items-center justify-between">
          <h2 className="text-sm font-medium text-gray-700">
            {session.question ?? "Ask about this page"}
          </h2>
          {onClose && (
            <button
              type="button"
              onClick={onClose}
              className="p-1 rounded hover:bg-gray-100"
              aria-label="Close"
            >
              ×
            </button>
          )}
        </header>
        <p data-testid="answer-text" className="whitespace-pre-wrap text-gray-900">
          {answer.text}
        </p>
        {session.isAnswering && (
          <div className="flex items-center justify-between text-xs text-gray-500">
            <span role="status">Answering…</span>
            <button type="button" onClick={session.stopAnswer}>
              Stop
            </button>
          </div>
        )}
        {session.aiError && (
          <p role="alert" className="text-sm text-red-600">
            {session.aiError}
          </p>
        )}
      </section>
    );
  },
);
