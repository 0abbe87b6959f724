import { ProbeError } from "../shared/errors.js";
import type { LiveStatus } from "../shared/types.js";
import type { ChzzkApi } from "./api.js";

/** Answers "is this channel broadcasting right now". Failures reject with ProbeError. */
export interface StatusProber {
  probe(channelId: string): Promise<LiveStatus>;
}

export class ChzzkStatusProber implements StatusProber {
  constructor(private readonly api: Pick<ChzzkApi, "checkLive">) {}

  async probe(channelId: string): Promise<LiveStatus> {
    try {
      return await this.api.checkLive(channelId);
    } catch (error) {
      if (error instanceof ProbeError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProbeError(`Live check for ${channelId} failed: ${reason}`, error);
    }
  }
}
