// src/http/axiosClient.ts
import axios, { AxiosInstance } from 'axios'
import axiosRetry from 'axios-retry'
import { HTTP_RETRIES, HTTP_TIMEOUT_SECONDS } from '../config'

export interface HttpClientOptions {
  timeoutMs?: number
  retries?: number
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const client = axios.create({
    timeout: options.timeoutMs ?? HTTP_TIMEOUT_SECONDS * 1000,
    headers: { 'User-Agent': 'solana-listing-alerts/1.0' }
  })

  axiosRetry(client, {
    retries: Math.max(0, Math.floor(options.retries ?? HTTP_RETRIES)),
    retryDelay: (retryCount) => Math.min(500 * Math.pow(2, retryCount - 1), 10_000),
    retryCondition: (error) => {
      // 429 is left to the fixed pass delays
      if (error.response?.status === 429) return false
      return axiosRetry.isNetworkOrIdempotentRequestError(error)
    }
  })

  return client
}

// feeds are polled with GETs only, so retrying them is safe
const client = createHttpClient()

export default client

// short description of an axios / generic error for log lines
export function describeError(e: unknown): string {
  if (axios.isAxiosError(e)) {
    if (e.response) {
      const body = typeof e.response.data === 'string' ? e.response.data : JSON.stringify(e.response.data ?? '')
      return `HTTP ${e.response.status} - ${body}`
    }
    return e.code ? `${e.code}: ${e.message}` : e.message
  }
  if (e instanceof Error) return e.message
  return String(e)
}
