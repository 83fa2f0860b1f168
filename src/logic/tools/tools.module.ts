import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ToolsService } from './tools.service';
import { SandboxModule } from '../sandbox/sandbox.module';
import { FencedCodeDetector, FunctionCallDetector, ToolInvocationDetector } from './tool-detector';
import { AppEnv } from '../../utils/env';

@Module({
  imports: [SandboxModule],
  providers: [
    ToolsService,
    {
      provide: ToolInvocationDetector,
      useFactory: (configService: ConfigService<AppEnv, true>): ToolInvocationDetector =>
        configService.get('TOOL_DETECTOR', { infer: true }) === 'fenced' ? new FencedCodeDetector() : new FunctionCallDetector(),
      inject: [ConfigService],
    },
  ],
  exports: [ToolsService, ToolInvocationDetector],
})
export class ToolsModule {}
