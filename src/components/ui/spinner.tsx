"use client";

import { cn } from "@/lib/utils";

export interface SpinnerProps extends React.HTMLAttributes<HTMLSpanElement> {
  size?: "sm" | "md" | "lg";
  label?: string;
}

const sizeMap: Record<NonNullable<SpinnerProps["size"]>, string> = {
  sm: "h-4 w-4 border-2",
  md: "h-5 w-5 border-2",
  lg: "h-8 w-8 border-[3px]",
};

export function Spinner({ className, size = "md", label = "Loading", ...props }: SpinnerProps) {
  return (
    <span
      role="status"
      aria-live="polite"
      aria-label={label}
      className={cn(
        "inline-flex animate-spin rounded-full border-current border-b-transparent text-primary",
        sizeMap[size],
        className
      )}
      {...props}
    />
  );
}

export function LoadingBlock({ message }: { message: string }) {
  return (
    <div className="flex items-center justify-center gap-3 rounded-2xl border border-dashed border-border p-8 text-sm text-muted">
      <Spinner />
      <span>{message}</span>
    </div>
  );
}
