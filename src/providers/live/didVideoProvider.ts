import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { MediaAsset } from "../../domain/models.js";
import { Outcome, failed, succeeded } from "../../runtime/outcome.js";
import { asObject, asString, isRecord } from "../../utils/json.js";
import { VideoJobStatus, VideoProvider } from "../types.js";
import { failureFromError, failureFromStatus } from "./providerErrors.js";

const PENDING_STATUSES = new Set(["created", "started", "pending", "processing"]);

/** Talking-head renders through the D-ID talks API. */
export class DidVideoProvider implements VideoProvider {
  readonly name = "d-id";

  constructor(private readonly config: RuntimeConfig) {}

  async submit(script: string, avatarRef: string, signal?: AbortSignal): Promise<Outcome<string>> {
    const response = await this.request("/talks", {
      method: "POST",
      signal,
      body: JSON.stringify({
        source_url: avatarRef,
        script: {
          type: "text",
          input: script,
          provider: { type: "microsoft", voice_id: "en-US-JennyNeural" }
        },
        config: { fluent: true, pad_audio: 0 }
      })
    });
    if (!response.ok) {
      return response;
    }

    const id = asString(asObject(response.value).id);
    return id ? succeeded(id) : failed("validation", "Talk submission returned no id");
  }

  async poll(jobId: string, signal?: AbortSignal): Promise<Outcome<VideoJobStatus>> {
    const response = await this.request(`/talks/${encodeURIComponent(jobId)}`, { method: "GET", signal });
    if (!response.ok) {
      return response;
    }

    const body = asObject(response.value);
    const status = asString(body.status).toLowerCase();
    if (status === "done") {
      const resultUrl = asString(body.result_url);
      return resultUrl ? succeeded({ status: "done", resultUrl }) : failed("validation", "Finished talk has no result_url");
    }
    if (PENDING_STATUSES.has(status)) {
      return succeeded({ status: "pending" });
    }

    const error = isRecord(body.error) ? asString(body.error.description) || asString(body.error.kind) : "";
    return succeeded({ status: "error", error: error || `status ${status || "unknown"}` });
  }

  async download(resultUrl: string, signal?: AbortSignal): Promise<Outcome<MediaAsset>> {
    try {
      const response = await fetch(resultUrl, { signal });
      if (!response.ok) {
        return failureFromStatus(response.status, await response.text());
      }

      const bytes = new Uint8Array(await response.arrayBuffer());
      return bytes.length > 0
        ? succeeded({ bytes, mediaType: "video/mp4", extension: "mp4" })
        : failed("validation", "Downloaded video is empty");
    } catch (error) {
      return failureFromError(error, signal);
    }
  }

  private async request(
    route: string,
    init: { method: "GET" | "POST"; body?: string; signal?: AbortSignal }
  ): Promise<Outcome<unknown>> {
    if (!this.config.didApiKey) {
      return failed("configuration", "DID_API_KEY is not set");
    }

    try {
      const response = await fetch(`${this.config.didApiUrl}${route}`, {
        method: init.method,
        body: init.body,
        signal: init.signal,
        headers: {
          Authorization: `Basic ${this.config.didApiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json"
        }
      });

      if (!response.ok) {
        return failureFromStatus(response.status, await response.text());
      }

      const body: unknown = await response.json();
      return isRecord(body) ? succeeded(body) : failed("validation", `Unexpected response from ${route}`);
    } catch (error) {
      return failureFromError(error, init.signal);
    }
  }
}
