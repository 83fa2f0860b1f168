import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { LanguageModel } from './language-model';

@Module({
    exports: [LanguageModel],
    providers: [GeminiService, { provide: LanguageModel, useExisting: GeminiService }],
})
export class GeminiModule {}
