export interface TraktServiceOptions {
  apiUrl: string
  clientId: string
  accessToken: string
  /** Items requested per history page */
  pageSize: number
  /** Per-request timeout */
  timeoutMs: number
}
