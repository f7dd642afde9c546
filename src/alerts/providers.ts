import { z } from 'zod';

export type AlertProviderTag = 'feishu' | 'dingtalk' | 'unknown';

export interface AlertProvider {
  /** Substrings of the webhook URL that select this provider. */
  patterns: readonly string[];
  buildPayload(text: string): unknown;
  /** Reads the provider's own result-code field; false when absent or non-zero. */
  isSuccess(body: unknown): boolean;
}

const feishuResult = z.object({
  code: z.number().optional(),
  // Older bot endpoints answer with StatusCode instead of code.
  StatusCode: z.number().optional(),
});

const dingtalkResult = z.object({
  errcode: z.number().optional(),
});

/**
 * Feishu / Lark custom bot.
 * POST { msg_type: "text", content: { text } } -> { code: 0, msg: "success" }
 */
const feishu: AlertProvider = {
  patterns: ['open.feishu.cn', 'open.larksuite.com'],
  buildPayload: (text) => ({ msg_type: 'text', content: { text } }),
  isSuccess: (body) => {
    const parsed = feishuResult.safeParse(body);
    if (!parsed.success) return false;
    return (parsed.data.code ?? parsed.data.StatusCode) === 0;
  },
};

/**
 * DingTalk custom robot.
 * POST { msgtype: "text", text: { content } } -> { errcode: 0, errmsg: "ok" }
 */
const dingtalk: AlertProvider = {
  patterns: ['oapi.dingtalk.com'],
  buildPayload: (text) => ({ msgtype: 'text', text: { content: text } }),
  isSuccess: (body) => {
    const parsed = dingtalkResult.safeParse(body);
    return parsed.success && parsed.data.errcode === 0;
  },
};

export const ALERT_PROVIDERS: Readonly<Record<Exclude<AlertProviderTag, 'unknown'>, AlertProvider>> = {
  feishu,
  dingtalk,
};

export function resolveAlertProvider(targetUrl: string): AlertProviderTag {
  const url = targetUrl.toLowerCase();
  if (ALERT_PROVIDERS.feishu.patterns.some((p) => url.includes(p))) return 'feishu';
  if (ALERT_PROVIDERS.dingtalk.patterns.some((p) => url.includes(p))) return 'dingtalk';
  return 'unknown';
}
