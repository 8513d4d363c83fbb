import type { Request } from "express"

export function reqLog(req: Request, ...args: unknown[]) {
  console.log(`[${req.callId ?? "-----"}]`, ...args)
}
