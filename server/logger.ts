import fetch from "node-fetch";

// Console logging, with warnings and errors mirrored to an optional webhook
// (LOG_WEBHOOK_URL, e.g. a chat channel the course staff watch).

let lastSent = 0;
const MIN_SEND_INTERVAL_MS = 3000; // rate limit protection
const MAX_MESSAGE_LENGTH = 2000;
const WEBHOOK_TIMEOUT_MS = 5000;

async function send(content: string) {
  const url = process.env.LOG_WEBHOOK_URL;
  if (!url) return;

  const now = Date.now();
  if (now - lastSent < MIN_SEND_INTERVAL_MS) return;
  lastSent = now;

  const truncated = content.slice(0, MAX_MESSAGE_LENGTH);
  try {
    await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ content: truncated }),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
    });
  } catch (err) {
    // the webhook is best effort; the console already has the message
    console.warn("[Logger] Webhook delivery failed:", err);
  }
}

// exposed helpers
export async function logError(title: string, err?: unknown) {
  console.error(title, err);
  await send(
    `🚨 **${title}**\n\`\`\`${String(err ?? "No details").slice(0, 1800)}\`\`\``
  );
}

export async function logWarn(message: string) {
  console.warn(message);
  await send(`***Warning***\n${message}`);
}

export function logInfo(message: string) {
  console.log(message);
}

/** Test hook: forget the last send time so the rate limit starts fresh. */
export function resetLoggerState() {
  lastSent = 0;
}
