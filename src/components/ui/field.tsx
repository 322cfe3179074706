"use client";

import { forwardRef, useId, type ReactNode } from "react";
import { cn } from "@/lib/utils";

interface FieldChromeProps {
  label?: string;
  description?: string;
  error?: string;
}

const controlClass =
  "w-full rounded-xl border border-border bg-background text-sm text-foreground shadow-sm transition focus:border-primary focus:outline-none focus:ring-2 focus:ring-primary/20 placeholder:text-muted";

function describedBy(fieldId: string, description?: string, error?: string) {
  return (
    [description ? `${fieldId}-description` : null, error ? `${fieldId}-error` : null]
      .filter(Boolean)
      .join(" ") || undefined
  );
}

function FieldFrame({
  fieldId,
  label,
  description,
  error,
  children,
}: FieldChromeProps & { fieldId: string; children: ReactNode }) {
  return (
    <label className="flex w-full flex-col gap-1.5 text-sm text-foreground" htmlFor={fieldId}>
      {label && <span className="font-medium text-foreground/90">{label}</span>}
      {children}
      {description && (
        <span id={`${fieldId}-description`} className="text-xs text-muted">
          {description}
        </span>
      )}
      {error && (
        <span id={`${fieldId}-error`} className="text-xs text-destructive">
          {error}
        </span>
      )}
    </label>
  );
}

export interface InputProps extends React.InputHTMLAttributes<HTMLInputElement>, FieldChromeProps {}

export const Input = forwardRef<HTMLInputElement, InputProps>(function Input(
  { className, label, id, description, error, ...props },
  ref
) {
  const autoId = useId();
  const fieldId = id ?? props.name ?? autoId;

  return (
    <FieldFrame fieldId={fieldId} label={label} description={description} error={error}>
      <input
        ref={ref}
        id={fieldId}
        className={cn("h-11 px-4", controlClass, error && "border-destructive", className)}
        aria-invalid={Boolean(error)}
        aria-describedby={describedBy(fieldId, description, error)}
        {...props}
      />
    </FieldFrame>
  );
});

export interface TextAreaProps
  extends React.TextareaHTMLAttributes<HTMLTextAreaElement>,
    FieldChromeProps {}

export const TextArea = forwardRef<HTMLTextAreaElement, TextAreaProps>(function TextArea(
  { className, label, id, description, error, ...props },
  ref
) {
  const autoId = useId();
  const fieldId = id ?? props.name ?? autoId;

  return (
    <FieldFrame fieldId={fieldId} label={label} description={description} error={error}>
      <textarea
        ref={ref}
        id={fieldId}
        className={cn("min-h-[96px] px-4 py-3", controlClass, error && "border-destructive", className)}
        aria-invalid={Boolean(error)}
        aria-describedby={describedBy(fieldId, description, error)}
        {...props}
      />
    </FieldFrame>
  );
});

export interface SelectOption {
  value: string;
  label: string;
}

export interface SelectProps
  extends Omit<React.SelectHTMLAttributes<HTMLSelectElement>, "children">,
    FieldChromeProps {
  options: readonly SelectOption[];
  placeholder?: string;
}

export const Select = forwardRef<HTMLSelectElement, SelectProps>(function Select(
  { className, label, id, description, error, options, placeholder, ...props },
  ref
) {
  const autoId = useId();
  const fieldId = id ?? props.name ?? autoId;

  return (
    <FieldFrame fieldId={fieldId} label={label} description={description} error={error}>
      <select
        ref={ref}
        id={fieldId}
        className={cn("h-11 px-3", controlClass, error && "border-destructive", className)}
        aria-invalid={Boolean(error)}
        aria-describedby={describedBy(fieldId, description, error)}
        {...props}
      >
        {placeholder && <option value="">{placeholder}</option>}
        {options.map((option) => (
          <option key={option.value} value={option.value}>
            {option.label}
          </option>
        ))}
      </select>
    </FieldFrame>
  );
});
