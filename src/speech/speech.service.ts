import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { truncate } from '../common/utils/text.util';
import { OpenAiService } from '../openai/openai.service';
import { cleanForTts } from '../summary/text-cleanup';
import { Voice, pickVoice } from './voices';

export const SPEECH_RANDOM = Symbol('SPEECH_RANDOM');

// speech 엔드포인트 입력 한도
export const MAX_SPEECH_INPUT = 4096;

@Injectable()
export class SpeechService {
  private readonly logger = new Logger(SpeechService.name);
  private readonly random: () => number;

  constructor(
    private readonly openAi: OpenAiService,
    @Optional() @Inject(SPEECH_RANDOM) random?: () => number,
  ) {
    this.random = random ?? Math.random;
  }

  async synthesize(text: string, voice?: Voice): Promise<Buffer> {
    const input = truncate(cleanForTts(text), MAX_SPEECH_INPUT);
    if (!input) {
      throw new Error('Nothing to narrate');
    }

    const selected = voice ?? pickVoice(this.random);
    this.logger.log(`Narrating ${input.length} characters with voice "${selected}"`);
    return this.openAi.speech(input, selected);
  }
}
