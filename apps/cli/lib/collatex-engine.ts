import type { AlignmentEngine, AlignmentInput } from "@hebrew-apparatus/core";
import type { CollatexConfig } from "./config.js";

/** Client for a CollateX server's REST endpoint, answering in TEI. */
export class CollatexEngine implements AlignmentEngine {
  constructor(private readonly config: CollatexConfig) {}

  async align(input: AlignmentInput): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await fetch(`${this.config.url}/collate`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json; charset=utf-8",
          Accept: "application/tei+xml",
        },
        body: JSON.stringify({ witnesses: input.witnesses, joined: false }),
        signal: controller.signal,
      });
      const body = await response.text();
      if (!response.ok) {
        throw new Error(`CollateX responded ${response.status}: ${body.slice(0, 200)}`);
      }
      return body;
    } finally {
      clearTimeout(timeout);
    }
  }
}
