import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { GeminiModule } from '../gemini/gemini.module';
import { ToolsModule } from '../tools/tools.module';
import { FileUploadModule } from '../file-upload/file-upload.module';
import { SocketGatewayModule } from '../socket-gateway/socket-gateway.module';

@Module({
    imports: [
        ChatMemoryModule,
        GeminiModule,
        ToolsModule,
        FileUploadModule,
        SocketGatewayModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
