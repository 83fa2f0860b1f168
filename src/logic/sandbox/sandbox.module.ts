import { Module } from '@nestjs/common';
import { SandboxService } from './sandbox.service';
import { SandboxRunner } from './sandbox-runner';

@Module({
    exports: [SandboxRunner],
    providers: [SandboxService, { provide: SandboxRunner, useExisting: SandboxService }],
})
export class SandboxModule {}
