/**
 * Telegram Notification Sender
 *
 * Sends Markdown messages through the Telegram Bot API sendMessage method.
 * One request per chat id; the caller fans out over recipients.
 */

export interface TelegramConfig {
  botToken: string;
  apiBaseUrl?: string;
  timeout?: number; // milliseconds
  retryCount?: number;
}

export interface SendResult {
  success: boolean;
  statusCode?: number;
  error?: string;
}

const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

interface TelegramResponseBody {
  ok?: boolean;
  description?: string;
  parameters?: { retry_after?: number };
}

function parseResponseBody(text: string): TelegramResponseBody {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object') {
      const body: TelegramResponseBody = {};
      if ('ok' in parsed && typeof parsed.ok === 'boolean') body.ok = parsed.ok;
      if ('description' in parsed && typeof parsed.description === 'string') body.description = parsed.description;
      if ('parameters' in parsed && parsed.parameters && typeof parsed.parameters === 'object'
        && 'retry_after' in parsed.parameters && typeof parsed.parameters.retry_after === 'number') {
        body.parameters = { retry_after: parsed.parameters.retry_after };
      }
      return body;
    }
  } catch {
    // Non-JSON error pages from proxies fall through to the raw text
  }
  return { description: text.substring(0, 500) };
}

/**
 * Split a message on line boundaries so each part fits Telegram's limit
 */
export function splitTelegramMessage(text: string, limit = TELEGRAM_MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= limit) return [text];

  const parts: string[] = [];
  let current = '';
  for (const line of text.split('\n')) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }
    if (current) parts.push(current);
    let rest = line;
    while (rest.length > limit) {
      parts.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }
  if (current) parts.push(current);
  return parts;
}

/**
 * Send a Markdown message to one Telegram chat
 */
export async function sendTelegramNotification(
  config: TelegramConfig,
  chatId: string,
  text: string
): Promise<SendResult> {
  const baseUrl = (config.apiBaseUrl || 'https://api.telegram.org').replace(/\/+$/, '');
  const url = `${baseUrl}/bot${config.botToken}/sendMessage`;
  const timeout = config.timeout || 15000;
  const maxRetries = config.retryCount ?? 2;

  for (const part of splitTelegramMessage(text)) {
    const result = await sendPart(url, chatId, part, timeout, maxRetries);
    if (!result.success) {
      // Never log the URL: it carries the bot token
      console.error(`[TelegramSender] Failed to send to chat ${chatId}: ${result.error}`);
      return result;
    }
  }

  return { success: true, statusCode: 200 };
}

async function sendPart(
  url: string,
  chatId: string,
  text: string,
  timeout: number,
  maxRetries: number
): Promise<SendResult> {
  let lastError: string | undefined;
  let lastStatus: number | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let retryAfterMs: number | undefined;
    try {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: chatId,
          text,
          parse_mode: 'Markdown',
          disable_web_page_preview: true
        }),
        signal: controller.signal
      }).finally(() => clearTimeout(timeoutId));

      const body = parseResponseBody(await response.text());
      if (response.ok && body.ok !== false) {
        return { success: true, statusCode: response.status };
      }

      lastStatus = response.status;
      lastError = `HTTP ${response.status}: ${body.description ?? 'request rejected'}`;

      if (response.status === 429 && body.parameters?.retry_after !== undefined) {
        retryAfterMs = body.parameters.retry_after * 1000;
      } else if (response.status >= 400 && response.status < 500) {
        break;
      }
    } catch (error) {
      if (error instanceof Error) {
        lastError = error.name === 'AbortError' ? 'Request timed out' : error.message;
      } else {
        lastError = 'Unknown error';
      }
    }

    if (attempt < maxRetries) {
      await new Promise(resolve => setTimeout(resolve, retryAfterMs ?? Math.pow(2, attempt) * 1000));
    }
  }

  return { success: false, statusCode: lastStatus, error: lastError };
}
