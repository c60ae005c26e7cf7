export type RealtimeEndpoint = {
  readonly endpoint: string;
  readonly deployment: string;
  readonly apiVersion: string;
};

export const USER_AGENT = "dubline/0.1";

export function buildRealtimeUrl(target: RealtimeEndpoint): string {
  const base = target.endpoint
    .trim()
    .replace(/\/+$/, "")
    .replace(/^https:\/\//i, "wss://")
    .replace(/^http:\/\//i, "ws://");
  const params = new URLSearchParams({
    "api-version": target.apiVersion,
    deployment: target.deployment,
  });
  return `${base}/openai/realtime?${params.toString()}`;
}

export function buildRealtimeHeaders(apiKey: string): Record<string, string> {
  return {
    "api-key": apiKey,
    "OpenAI-Beta": "realtime=v1",
    "User-Agent": USER_AGENT,
  };
}
