import {
  ToolFailure,
  type HttpAdapter,
  type NotificationChannel,
  type NotificationMessage,
} from '@shipline/core'

/**
 * Creates a channel that posts each message as JSON to a webhook.
 *
 * @param webhookUrl Receiving URL.
 * @param http HTTP adapter.
 * @param timeoutMs Request timeout.
 * @returns Notification channel.
 * @throws From `send`: the adapter error, or a ToolFailure for a non-2xx response.
 */
export const createWebhookChannel = (
  webhookUrl: string,
  http: HttpAdapter,
  timeoutMs = 10_000
): NotificationChannel => {
  return {
    send: async (message: NotificationMessage): Promise<void> => {
      const result = await http({
        url: webhookUrl,
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(message),
        timeoutMs,
      })

      if (!result.ok) {
        throw result.error
      }

      if (result.value.status < 200 || result.value.status >= 300) {
        throw new ToolFailure(`Webhook ${webhookUrl} responded with status ${result.value.status}`)
      }
    },
  }
}
