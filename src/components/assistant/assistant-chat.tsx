"use client";

import { FormEvent, useState } from "react";
import Link from "next/link";
import { Button } from "@/components/ui/button";
import { TextArea } from "@/components/ui/field";
import { apiRequest, describeError } from "@/lib/api-client";
import type { AssistantReply } from "@/lib/llm/travel-assistant";
import { cn } from "@/lib/utils";

interface ChatTurn {
  role: "user" | "assistant";
  content: string;
  suggestedDestinations?: string[];
  followUpQuestions?: string[];
}

const starterQuestions = [
  "Where should I go for a relaxing beach week in December?",
  "Which destination is best for food lovers on a mid-range budget?",
  "What should I know before visiting Tokyo in spring?",
];

export function AssistantChat() {
  const [turns, setTurns] = useState<ChatTurn[]>([]);
  const [question, setQuestion] = useState("");
  const [pending, setPending] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const ask = async (text: string) => {
    const trimmed = text.trim();
    if (!trimmed || pending) return;

    const history = turns.map(({ role, content }) => ({ role, content }));
    setTurns((current) => [...current, { role: "user", content: trimmed }]);
    setQuestion("");
    setError(null);

    try {
      setPending(true);
      const reply = await apiRequest<AssistantReply>("/api/assistant", {
        body: { question: trimmed, history },
      });
      setTurns((current) => [
        ...current,
        {
          role: "assistant",
          content: reply.answer,
          suggestedDestinations: reply.suggestedDestinations,
          followUpQuestions: reply.followUpQuestions,
        },
      ]);
    } catch (requestError) {
      setError(describeError(requestError, "The assistant is unavailable right now."));
    } finally {
      setPending(false);
    }
  };

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    void ask(question);
  };

  return (
    <div className="space-y-6">
      {turns.length === 0 && (
        <div className="flex flex-wrap gap-2">
          {starterQuestions.map((starter) => (
            <button
              key={starter}
              type="button"
              onClick={() => void ask(starter)}
              className="rounded-full border border-border px-3 py-1.5 text-sm text-muted transition hover:text-foreground"
            >
              {starter}
            </button>
          ))}
        </div>
      )}

      <ol className="space-y-4">
        {turns.map((turn, index) => (
          <li
            key={`${turn.role}-${index}`}
            className={cn(
              "max-w-[85%] space-y-2 rounded-2xl px-4 py-3 text-sm",
              turn.role === "user"
                ? "ml-auto bg-primary text-primary-foreground"
                : "border border-border bg-surface shadow-card"
            )}
          >
            <p className="whitespace-pre-line">{turn.content}</p>
            {turn.suggestedDestinations && turn.suggestedDestinations.length > 0 && (
              <div className="flex flex-wrap gap-2">
                {turn.suggestedDestinations.map((name) => (
                  <Link
                    key={name}
                    href={`/planner?destination=${encodeURIComponent(name)}`}
                    className="rounded-full bg-primary/10 px-2 py-0.5 text-xs text-primary hover:underline"
                  >
                    Plan {name}
                  </Link>
                ))}
              </div>
            )}
            {turn.followUpQuestions && turn.followUpQuestions.length > 0 && (
              <div className="flex flex-wrap gap-2">
                {turn.followUpQuestions.map((followUp) => (
                  <button
                    key={followUp}
                    type="button"
                    onClick={() => void ask(followUp)}
                    className="rounded-full border border-border px-2 py-0.5 text-xs text-muted hover:text-foreground"
                  >
                    {followUp}
                  </button>
                ))}
              </div>
            )}
          </li>
        ))}
      </ol>

      {error && <p className="text-sm text-destructive">{error}</p>}

      <form onSubmit={handleSubmit} className="space-y-3">
        <TextArea
          rows={3}
          placeholder="Ask about destinations, seasons, budgets or what to pack"
          value={question}
          onChange={(event) => setQuestion(event.target.value)}
        />
        <Button type="submit" loading={pending} disabled={!question.trim()}>
          Ask
        </Button>
      </form>
    </div>
  );
}
