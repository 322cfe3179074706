import { NextResponse, type NextRequest } from "next/server";
import { consumeRateLimit, getRequestIdentifier, resolveRateLimitNumber } from "@/lib/rate-limit";

const GLOBAL_RATE_LIMIT_WINDOW_MS = resolveRateLimitNumber(
  process.env.GLOBAL_API_RATE_LIMIT_WINDOW_MS,
  60_000
);
const GLOBAL_RATE_LIMIT_MAX = resolveRateLimitNumber(process.env.GLOBAL_API_RATE_LIMIT_MAX, 120);

export function middleware(request: NextRequest) {
  if (!request.nextUrl.pathname.startsWith("/api/")) {
    return NextResponse.next();
  }

  const result = consumeRateLimit({
    bucket: "global_api",
    identifier: getRequestIdentifier(request),
    windowMs: GLOBAL_RATE_LIMIT_WINDOW_MS,
    limit: GLOBAL_RATE_LIMIT_MAX,
  });

  const nextResponse = result.allowed
    ? NextResponse.next()
    : NextResponse.json(
        {
          success: false,
          error: {
            message: "Too many requests, please slow down.",
            code: "global_rate_limited",
          },
        },
        { status: 429 }
      );

  Object.entries(result.headers).forEach(([key, value]) => {
    nextResponse.headers.set(key, value);
  });

  return nextResponse;
}

export const config = {
  matcher: ["/api/:path*"],
};
