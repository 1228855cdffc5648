import type { ParsedLine } from './types';

// log_format ui_short '$remote_addr $remote_user $http_x_real_ip [$time_local] "$request" '
//                     '$status $body_bytes_sent "$http_referer" '
//                     '"$http_user_agent" "$http_x_forwarded_for" "$http_X_REQUEST_ID" "$http_X_RB_USER" '
//                     '$request_time';
// Fields never cross their own delimiters.
const UI_SHORT_LINE = new RegExp(
  [
    String.raw`^(?<remoteAddr>\d{1,3}(?:\.\d{1,3}){3})\s+`,
    String.raw`(?<remoteUser>\S+)\s+(?<realIp>\S+)\s+`,
    String.raw`\[(?<timeLocal>[^\]]*)\]\s+`,
    String.raw`"(?<method>[^"\s]+)\s+(?<url>[^"\s]+)(?:\s+HTTP\/[^"]*)?"\s+`,
    String.raw`(?<status>\S+)\s+(?<bytesSent>\S+)\s+`,
    String.raw`"(?<referer>[^"]*)"\s+"(?<userAgent>[^"]*)"\s+"(?<forwardedFor>[^"]*)"\s+`,
    String.raw`"(?<requestId>[^"]*)"\s+"(?<rbUser>[^"]*)"\s+`,
    String.raw`(?<requestTime>\d+(?:\.\d*)?)\s*$`,
  ].join(''),
);

export function parseLogLine(line: string): ParsedLine | null {
  const match = UI_SHORT_LINE.exec(line);
  const url = match?.groups?.url;
  const rawTime = match?.groups?.requestTime;
  if (url === undefined || rawTime === undefined) {
    return null;
  }

  const requestTime = Number(rawTime);
  if (!Number.isFinite(requestTime)) {
    return null;
  }

  return { url, requestTime };
}
