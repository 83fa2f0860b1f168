import { Module } from '@nestjs/common';
import { ChatMemoryService } from './chat-memory.service';
import { SessionStore } from './session-store';
import { TurnLockService } from './turn-lock.service';
import { SessionEvictionService } from './session-eviction.service';

@Module({
    providers: [
        ChatMemoryService,
        { provide: SessionStore, useExisting: ChatMemoryService },
        TurnLockService,
        SessionEvictionService,
    ],
    exports: [SessionStore, TurnLockService],
})
export class ChatMemoryModule {}
