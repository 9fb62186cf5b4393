// src/services/notifier.ts
import { AxiosInstance } from 'axios'
import debug from 'debug'
import FormData from 'form-data'
import { createHttpClient, describeError } from '../http/axiosClient'
import { TELEGRAM_API_URL, TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID } from '../config'

const log = debug('alerts:notifier')

// sends are never retried: a retried POST may post the alert twice
const sendClient = createHttpClient({ retries: 0 })

export interface NotifierOptions {
  botToken?: string
  chatId?: string
  apiUrl?: string
  client?: AxiosInstance
}

// post an HTML alert, as a photo caption when an image is given; true on a 2xx reply
export async function sendToTelegram(
  message: string,
  image?: Buffer | null,
  options: NotifierOptions = {}
): Promise<boolean> {
  const botToken = options.botToken ?? TELEGRAM_BOT_TOKEN
  const chatId = options.chatId ?? TELEGRAM_CHAT_ID
  const client = options.client ?? sendClient
  const base = `${(options.apiUrl ?? TELEGRAM_API_URL).replace(/\/+$/, '')}/bot${botToken}`

  if (!message || !botToken || !chatId) {
    // eslint-disable-next-line no-console
    console.error('sendToTelegram: missing message, bot token or chat id')
    return false
  }

  try {
    if (image) {
      const form = new FormData()
      form.append('chat_id', chatId)
      form.append('caption', message)
      form.append('parse_mode', 'HTML')
      form.append('photo', image, { filename: 'graph.png', contentType: 'image/png' })
      await client.post(`${base}/sendPhoto`, form, { headers: form.getHeaders() })
      log('photo sent to %s', chatId)
    } else {
      await client.post(`${base}/sendMessage`, {
        chat_id: chatId,
        text: message,
        parse_mode: 'HTML',
        disable_web_page_preview: true
      })
      log('message sent to %s', chatId)
    }
    return true
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error('sendToTelegram error', describeError(e))
    return false
  }
}
