export type LogArea = "node" | "scope" | "bridge" | "signal";
export type LogSink = (line: string) => void;

// 預設關閉；enableLogging() 後才輸出
let sink: LogSink | null = null;

export function enableLogging(next: LogSink = (line) => console.log(line)) {
  sink = next;
}

export function disableLogging() {
  sink = null;
}

export function isLogging() {
  return sink !== null;
}

export function log(area: LogArea, message: string) {
  if (!sink) return;
  sink(`[${area}] ${message}`);
}
