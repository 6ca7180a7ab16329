import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { BRIEF_CONFIG, BriefConfig } from '../config/brief.config';

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

// OpenAI 호환 REST API 클라이언트 (chat completions, audio speech)
@Injectable()
export class OpenAiService {
  private readonly logger = new Logger(OpenAiService.name);
  private readonly http: AxiosInstance;
  private readonly model: string;
  private readonly ttsModel: string;

  constructor(@Inject(BRIEF_CONFIG) config: BriefConfig) {
    this.model = config.openai.model;
    this.ttsModel = config.openai.ttsModel;
    this.http = axios.create({
      baseURL: config.openai.baseUrl,
      timeout: config.httpTimeoutMs,
      headers: {
        Authorization: `Bearer ${config.openai.apiKey}`,
        'Content-Type': 'application/json',
      },
    });
  }

  // JSON 객체 응답을 요청하고 원문 문자열을 그대로 돌려준다. 파싱은 호출자 몫.
  async chatJson(systemPrompt: string, userContent: string): Promise<string> {
    return this.complete(systemPrompt, userContent, {
      temperature: 0.2,
      response_format: { type: 'json_object' },
    });
  }

  async chatText(
    systemPrompt: string,
    userContent: string,
    options: ChatOptions = {},
  ): Promise<string> {
    return this.complete(systemPrompt, userContent, {
      temperature: options.temperature ?? 0.2,
      ...(options.maxTokens ? { max_tokens: options.maxTokens } : {}),
    });
  }

  async speech(text: string, voice: string): Promise<Buffer> {
    this.logger.debug(`Synthesizing ${text.length} characters with voice ${voice}`);
    const response = await this.http.post<ArrayBuffer>(
      '/audio/speech',
      {
        model: this.ttsModel,
        voice,
        input: text,
        response_format: 'mp3',
      },
      { responseType: 'arraybuffer' },
    );
    return Buffer.from(response.data);
  }

  private async complete(
    systemPrompt: string,
    userContent: string,
    extra: Record<string, unknown>,
  ): Promise<string> {
    const response = await this.http.post<ChatCompletionResponse>(
      '/chat/completions',
      {
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userContent },
        ],
        ...extra,
      },
    );

    const content = response.data.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('Chat completion returned no message content');
    }
    return content.trim();
  }
}
