import { RAY_LOG_STDOUT } from "../config/env";

export function log(message: string, source = "rays") {
  if (!RAY_LOG_STDOUT()) return;
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}
