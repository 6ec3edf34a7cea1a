// src/alerting/alert-service.ts — Out-of-band operator alerts
//
// Routes scheduler alerts (ledger write failures, faulted jobs, exhausted
// retries) to the console and an optional webhook. Repeats of the same
// {severity}:{triggerType}:{jobId} within the dedup window are suppressed.

// ── Types ───────────────────────────────────────────────────

export type AlertSeverity = "critical" | "error" | "warning" | "info"

export type AlertChannel = "webhook" | "log"

export interface AlertContext {
  jobId?: string
  runId?: string
  message: string
  details?: Record<string, unknown>
}

export interface AlertServiceConfig {
  /** POST target for JSON alerts (Slack/PagerDuty-style relays). */
  webhookUrl?: string
  routing?: Partial<Record<AlertSeverity, AlertChannel[]>>
  deduplicationWindowMs?: number
}

/** What the coordinator and engine depend on. */
export interface AlertServiceLike {
  fire(severity: AlertSeverity, triggerType: string, context: AlertContext): Promise<boolean>
}

export const DEFAULT_ROUTING: Record<AlertSeverity, AlertChannel[]> = {
  critical: ["webhook", "log"],
  error: ["webhook", "log"],
  warning: ["log"],
  info: ["log"],
}

const DEFAULT_DEDUP_WINDOW_MS = 15 * 60 * 1000

// ── AlertService ────────────────────────────────────────────

/** fire() never throws; channel errors go to stderr. */
export class AlertService implements AlertServiceLike {
  private readonly webhookUrl?: string
  private readonly routing: Record<AlertSeverity, AlertChannel[]>
  private readonly dedupWindowMs: number
  private readonly dedupCache = new Map<string, number>()
  private readonly fetchFn: typeof globalThis.fetch
  private readonly now: () => number

  constructor(
    config: AlertServiceConfig = {},
    deps?: { fetch?: typeof globalThis.fetch; now?: () => number },
  ) {
    this.webhookUrl = config.webhookUrl
    this.routing = { ...DEFAULT_ROUTING, ...config.routing }
    this.dedupWindowMs = config.deduplicationWindowMs ?? DEFAULT_DEDUP_WINDOW_MS
    this.fetchFn = deps?.fetch ?? globalThis.fetch
    this.now = deps?.now ?? Date.now
  }

  /** Returns false when the alert was suppressed as a duplicate. */
  async fire(severity: AlertSeverity, triggerType: string, context: AlertContext): Promise<boolean> {
    try {
      const currentTime = this.now()
      this.cleanupDedupCache(currentTime)

      const dedupKey = `${severity}:${triggerType}:${context.jobId ?? "_"}`
      const lastFired = this.dedupCache.get(dedupKey)
      if (lastFired !== undefined && currentTime - lastFired < this.dedupWindowMs) {
        return false
      }
      this.dedupCache.set(dedupKey, currentTime)

      await Promise.allSettled(
        this.routing[severity].map((channel) => this.dispatch(channel, severity, triggerType, context)),
      )
      return true
    } catch (err) {
      console.error("[alerts] unexpected error in fire():", err)
      return false
    }
  }

  // ── Channels ──────────────────────────────────────────────

  private async dispatch(
    channel: AlertChannel,
    severity: AlertSeverity,
    triggerType: string,
    context: AlertContext,
  ): Promise<void> {
    try {
      if (channel === "log") this.sendLog(severity, triggerType, context)
      else await this.sendWebhook(severity, triggerType, context)
    } catch (err) {
      console.error(`[alerts] channel "${channel}" failed:`, err)
    }
  }

  private sendLog(severity: AlertSeverity, triggerType: string, context: AlertContext): void {
    const prefix = `[alert:${severity}] ${triggerType}`
    const payload = { ...context, timestamp: new Date(this.now()).toISOString() }
    switch (severity) {
      case "critical":
      case "error":
        console.error(prefix, payload)
        break
      case "warning":
        console.warn(prefix, payload)
        break
      case "info":
        console.info(prefix, payload)
        break
    }
  }

  private async sendWebhook(severity: AlertSeverity, triggerType: string, context: AlertContext): Promise<void> {
    if (!this.webhookUrl) return

    const response = await this.fetchFn(this.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        severity,
        triggerType,
        timestamp: new Date(this.now()).toISOString(),
        context: {
          jobId: context.jobId ?? null,
          runId: context.runId ?? null,
          message: context.message,
          details: context.details ?? null,
        },
      }),
    })

    if (!response.ok) {
      const text = await response.text()
      throw new Error(`Webhook ${response.status}: ${text}`)
    }
  }

  private cleanupDedupCache(currentTime: number): void {
    const cutoff = currentTime - this.dedupWindowMs
    for (const [key, ts] of this.dedupCache) {
      if (ts < cutoff) this.dedupCache.delete(key)
    }
  }
}
