import type { AxiosInstance } from 'axios';
import { HuggingFaceConfig } from '../config/huggingface.js';
import { toUpstreamError } from '../utils/errors.js';

export interface ZeroShotResult {
  /** Labels, best first */
  labels: string[];
  /** Scores aligned with `labels` */
  scores: number[];
}

export interface ZeroShotClassifierClient {
  classify(text: string, candidateLabels: string[], hypothesisTemplate: string): Promise<ZeroShotResult>;
}

interface InferenceResponse {
  labels?: unknown;
  scores?: unknown;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

/**
 * Zero-shot NLI classification through the Hugging Face Inference API
 * (facebook/bart-large-mnli by default)
 */
export class HuggingFaceZeroShotClient implements ZeroShotClassifierClient {
  private http: AxiosInstance;
  private model: string;

  constructor(options: { http?: AxiosInstance; model?: string } = {}) {
    this.http = options.http ?? HuggingFaceConfig.getClient();
    this.model = options.model ?? HuggingFaceConfig.getConfig().zeroShotModel;
  }

  async classify(text: string, candidateLabels: string[], hypothesisTemplate: string): Promise<ZeroShotResult> {
    let body: InferenceResponse;
    try {
      const response = await this.http.post<InferenceResponse>(`/${this.model}`, {
        inputs: text,
        parameters: {
          candidate_labels: candidateLabels,
          hypothesis_template: hypothesisTemplate,
          multi_label: false,
        },
        // 503 while the model is loading otherwise
        options: { wait_for_model: true },
      });
      body = response.data;
    } catch (error) {
      throw toUpstreamError('huggingface', error);
    }

    if (!isStringArray(body.labels) || !isNumberArray(body.scores) || body.labels.length !== body.scores.length) {
      throw new Error(`Unexpected zero-shot response from ${this.model}`);
    }

    return { labels: body.labels, scores: body.scores };
  }
}
