import { Module } from '@nestjs/common';
import { OpenAiModule } from '../openai/openai.module';
import { AudioConverterService } from './audio-converter.service';
import { SpeechService } from './speech.service';

@Module({
  imports: [OpenAiModule],
  providers: [
    SpeechService,
    {
      provide: AudioConverterService,
      useFactory: () => new AudioConverterService(),
    },
  ],
  exports: [SpeechService, AudioConverterService],
})
export class SpeechModule {}
