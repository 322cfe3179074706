import { formatCurrency } from "@/lib/format";
import type { ExpenseSummary } from "@/lib/planner/expenses";
import { cn } from "@/lib/utils";

function clampPercentage(value: number) {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function TripBudgetSummary({ expenses }: { expenses: ExpenseSummary }) {
  const { totalBudget, totalCost, remainingBudget, overBudget, overBy } = expenses;

  return (
    <div className="space-y-6">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <div>
          <p className="text-xs font-medium uppercase tracking-wide text-muted">Estimated total</p>
          <p className="mt-1 text-2xl font-semibold">{formatCurrency(totalCost)}</p>
          <p className="text-xs text-muted">of {formatCurrency(totalBudget)} budget</p>
        </div>
        <span
          className={cn(
            "rounded-full px-3 py-1 text-xs font-medium",
            overBudget ? "bg-rose-100 text-rose-700" : "bg-emerald-100 text-emerald-600"
          )}
        >
          {overBudget
            ? `Over budget by ${formatCurrency(overBy)}`
            : `${formatCurrency(remainingBudget)} left`}
        </span>
      </div>

      <ul className="space-y-3">
        {expenses.categories.map((item) => {
          const share = clampPercentage(totalCost > 0 ? (item.amount / totalCost) * 100 : 0);
          return (
            <li key={item.category} className="space-y-2">
              <div className="flex items-center justify-between text-sm">
                <span className="font-medium">{item.category}</span>
                <span>
                  {formatCurrency(item.amount)}
                  <span className="ml-1 text-xs text-muted">({share}%)</span>
                </span>
              </div>
              <div className="h-2 rounded-full bg-muted/20">
                <div className="h-full rounded-full bg-primary transition-all" style={{ width: `${share}%` }} />
              </div>
            </li>
          );
        })}
      </ul>

      <table className="w-full text-left text-sm">
        <thead className="text-xs uppercase tracking-wide text-muted">
          <tr>
            <th className="py-2">Category</th>
            <th className="py-2">Description</th>
            <th className="py-2 text-right">Amount</th>
          </tr>
        </thead>
        <tbody>
          {expenses.lineItems.map((item, index) => (
            <tr key={`${item.category}-${index}`} className="border-t border-border/60">
              <td className="py-2 pr-3 text-muted">{item.category}</td>
              <td className="py-2 pr-3">{item.description}</td>
              <td className="py-2 text-right">{formatCurrency(item.amount)}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
