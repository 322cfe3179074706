import type { Metadata } from "next";
import Link from "next/link";
import "./globals.css";
import { AppProviders } from "@/components/providers/app-providers";
import { AuthMenu } from "@/components/navigation/auth-menu";

export const metadata: Metadata = {
  title: "AI Travel Buddy",
  description: "Plan a trip in minutes: day-by-day itineraries, budgets, packing lists and travel tips.",
};

const navLinks = [
  { href: "/planner", label: "Plan a trip" },
  { href: "/destinations", label: "Destinations" },
  { href: "/assistant", label: "Ask the assistant" },
  { href: "/trips", label: "My trips" },
];

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="min-h-screen bg-background text-foreground antialiased">
        <AppProviders>
          <div className="relative flex min-h-screen flex-col">
            <header className="sticky inset-x-0 top-0 z-40 border-b border-border/60 bg-surface/80 backdrop-blur">
              <div className="mx-auto flex max-w-6xl items-center justify-between gap-6 px-6 py-4">
                <Link href="/" className="flex items-center gap-2 text-lg font-semibold">
                  <span className="inline-flex h-9 w-9 items-center justify-center rounded-2xl bg-primary text-primary-foreground shadow-sm">
                    ✈
                  </span>
                  <span>AI Travel Buddy</span>
                </Link>
                <nav className="hidden items-center gap-6 text-sm text-muted md:flex">
                  {navLinks.map((link) => (
                    <Link key={link.href} href={link.href} className="transition hover:text-foreground">
                      {link.label}
                    </Link>
                  ))}
                </nav>
                <AuthMenu />
              </div>
            </header>
            <main className="flex-1">
              <div className="mx-auto w-full max-w-6xl px-6 py-12">{children}</div>
            </main>
            <footer className="border-t border-border/60 bg-surface py-8">
              <div className="mx-auto max-w-6xl px-6 text-sm text-muted">
                © {new Date().getFullYear()} AI Travel Buddy · Estimates only, check prices before booking.
              </div>
            </footer>
          </div>
        </AppProviders>
      </body>
    </html>
  );
}
