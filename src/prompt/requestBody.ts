import type { ImageSource } from "./messages.js";

/** File attachment whose text Claude.ai inlines into the turn. */
export interface Attachment {
  extracted_content: string;
  file_name: string;
  file_type: string;
  file_size: number;
}

/** Body of the upstream `.../completion` call. */
export interface RequestBody {
  prompt: string;
  model?: string;
  max_tokens_to_sample: number;
  attachments: Attachment[];
  files: string[];
  rendering_mode: "messages" | "raw";
  timezone: string;
}

export interface UpstreamTurn {
  body: RequestBody;
  /** Uploaded separately; the resulting file ids land in `body.files`. */
  images: ImageSource[];
}

export interface BuildRequestBodyOptions {
  prompt: string;
  model?: string;
  maxTokens: number;
  messagesApi: boolean;
  timezone: string;
  pastePrompt: boolean;
  customPrompt: string;
  images: ImageSource[];
}

export function pasteAttachment(content: string): Attachment {
  return {
    extracted_content: content,
    file_name: "paste.txt",
    file_type: "txt",
    file_size: Buffer.byteLength(content, "utf8"),
  };
}

/** Model names may carry a `--force` suffix that only selects the cookie. */
export function upstreamModelName(model: string): string {
  return model.replace("--force", "").trim();
}

export function buildRequestBody(options: BuildRequestBodyOptions): UpstreamTurn {
  const body: RequestBody = {
    prompt: options.pastePrompt ? options.customPrompt : options.prompt,
    max_tokens_to_sample: options.maxTokens,
    attachments: options.pastePrompt ? [pasteAttachment(options.prompt)] : [],
    files: [],
    rendering_mode: options.messagesApi ? "messages" : "raw",
    timezone: options.timezone,
  };

  if (options.model) {
    body.model = upstreamModelName(options.model);
  }

  return { body, images: options.images };
}
