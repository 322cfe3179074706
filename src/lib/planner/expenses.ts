import { truncateText } from "@/lib/format";
import type { Itinerary, TimeOfDay } from "@/types/travel";
import { roundMoney } from "./recommendation-engine";

export type ExpenseCategory =
  | "Transportation"
  | "Accommodation"
  | "Activities"
  | "Food"
  | "Miscellaneous";

export interface ExpenseLineItem {
  category: ExpenseCategory;
  description: string;
  amount: number;
}

export interface ExpenseSummary {
  categories: { category: ExpenseCategory; amount: number }[];
  totalBudget: number;
  totalCost: number;
  remainingBudget: number;
  overBudget: boolean;
  overBy: number;
  lineItems: ExpenseLineItem[];
}

const SLOT_LABELS: Record<TimeOfDay, string> = {
  morning: "Morning",
  afternoon: "Afternoon",
  evening: "Evening",
};

const SLOT_DESCRIPTION_LIMIT = 50;

export function summarizeExpenses(itinerary: Itinerary): ExpenseSummary {
  const { budgetBreakdown, trip } = itinerary;

  const categories: ExpenseSummary["categories"] = [
    { category: "Transportation", amount: budgetBreakdown.transportation },
    { category: "Accommodation", amount: budgetBreakdown.accommodation },
    { category: "Activities", amount: budgetBreakdown.activities },
    { category: "Food", amount: budgetBreakdown.food },
    { category: "Miscellaneous", amount: budgetBreakdown.miscellaneous },
  ];

  const totalCost = roundMoney(categories.reduce((sum, item) => sum + item.amount, 0));
  const remainingBudget = roundMoney(trip.budget - totalCost);

  const lineItems: ExpenseLineItem[] = [
    {
      category: "Transportation",
      description: `${itinerary.transportation.mode} (${trip.origin} to ${itinerary.destination.name})`,
      amount: itinerary.transportation.cost,
    },
    {
      category: "Accommodation",
      description: `${itinerary.accommodation.type} - ${itinerary.accommodation.name} (${trip.duration} nights)`,
      amount: itinerary.accommodation.totalCost,
    },
  ];

  for (const plan of itinerary.dailyPlans) {
    for (const slot of ["morning", "afternoon", "evening"] as const) {
      lineItems.push({
        category: "Activities",
        description: `Day ${plan.day} - ${SLOT_LABELS[slot]}: ${truncateText(plan[slot].description, SLOT_DESCRIPTION_LIMIT)}`,
        amount: plan[slot].cost,
      });
    }
  }

  lineItems.push(
    { category: "Food", description: "Meals and local dining", amount: budgetBreakdown.food },
    {
      category: "Miscellaneous",
      description: "Souvenirs, tips, unexpected expenses, etc.",
      amount: budgetBreakdown.miscellaneous,
    }
  );

  return {
    categories,
    totalBudget: trip.budget,
    totalCost,
    remainingBudget,
    overBudget: remainingBudget < 0,
    overBy: remainingBudget < 0 ? Math.abs(remainingBudget) : 0,
    lineItems,
  };
}
