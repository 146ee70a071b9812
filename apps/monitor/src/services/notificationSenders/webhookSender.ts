/**
 * Webhook Notification Sender
 *
 * Posts monitor notifications as JSON to an HTTP endpoint.
 * Supports custom headers and bearer or API key authentication.
 */

export interface WebhookNotificationPayload {
  kind: 'interface_change' | 'threshold_breach' | 'monthly_report' | 'monitor_error' | 'message';
  message: string;
  device?: string;
  recipients?: string[];
  context?: Record<string, unknown>;
}

export interface WebhookConfig {
  url: string;
  method?: 'POST' | 'PUT';
  headers?: Record<string, string>;
  authType?: 'none' | 'bearer' | 'api_key';
  authToken?: string;
  apiKeyHeader?: string;
  apiKeyValue?: string;
  timeout?: number; // milliseconds
  retryCount?: number;
}

export interface SendResult {
  success: boolean;
  statusCode?: number;
  error?: string;
  responseBody?: string;
}

/**
 * Send a notification to a webhook endpoint
 */
export async function sendWebhookNotification(
  config: WebhookConfig,
  payload: WebhookNotificationPayload
): Promise<SendResult> {
  const method = config.method || 'POST';
  const timeout = config.timeout || 30000;
  const maxRetries = config.retryCount || 0;

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'netpulse-monitor/1.0',
    ...(config.headers || {})
  };

  if (config.authType === 'bearer' && config.authToken) {
    headers['Authorization'] = `Bearer ${config.authToken}`;
  } else if (config.authType === 'api_key' && config.apiKeyHeader && config.apiKeyValue) {
    headers[config.apiKeyHeader] = config.apiKeyValue;
  }

  const body = JSON.stringify({
    event: `monitor.${payload.kind}`,
    timestamp: new Date().toISOString(),
    device: payload.device ?? null,
    message: payload.message,
    recipients: payload.recipients ?? [],
    context: payload.context
  });

  let lastError: string | undefined;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      const response = await fetch(config.url, {
        method,
        headers,
        body,
        signal: controller.signal
      });

      clearTimeout(timeoutId);

      const responseBody = await response.text();

      if (response.ok) {
        return {
          success: true,
          statusCode: response.status,
          responseBody
        };
      }

      lastError = `HTTP ${response.status}: ${responseBody.substring(0, 500)}`;

      // Don't retry on 4xx errors (client errors)
      if (response.status >= 400 && response.status < 500) {
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
      await new Promise(resolve => setTimeout(resolve, Math.pow(2, attempt) * 1000));
    }
  }

  console.error(`[WebhookSender] Failed to send to ${config.url}: ${lastError}`);

  return {
    success: false,
    error: lastError
  };
}

/**
 * Validate webhook channel configuration
 */
export function validateWebhookConfig(config: WebhookConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  try {
    const url = new URL(config.url);
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      errors.push('URL must use http or https');
    }
  } catch {
    errors.push('Invalid URL format');
  }

  if (config.authType === 'bearer' && !config.authToken) {
    errors.push('Bearer auth requires authToken');
  }
  if (config.authType === 'api_key' && (!config.apiKeyHeader || !config.apiKeyValue)) {
    errors.push('API key auth requires apiKeyHeader and apiKeyValue');
  }

  if (config.timeout !== undefined && (config.timeout < 1000 || config.timeout > 60000)) {
    errors.push('Timeout must be between 1000 and 60000 milliseconds');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
