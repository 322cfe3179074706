import { AssistantChat } from "@/components/assistant/assistant-chat";

export default function AssistantPage() {
  return (
    <div className="mx-auto max-w-3xl space-y-8">
      <header className="space-y-2">
        <h1 className="text-3xl font-semibold">Travel assistant</h1>
        <p className="text-muted">
          Ask anything about the destinations we cover. Answers are suggestions, double-check visas and prices.
        </p>
      </header>
      <AssistantChat />
    </div>
  );
}
