import { Body, Controller, Get, HttpCode, Post, Query, UploadedFiles, UseFilters, UseInterceptors } from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { v4 as uuidv4 } from 'uuid';
import { ChatService } from './chat.service';
import { SessionDto, SubmitTurnDto } from './dto/chat.dto';
import { TurnErrorFilter } from './turn-error.filter';
import { TurnResponse, toMessageView } from '../../utils/types';

@Controller('chat')
@UseFilters(TurnErrorFilter)
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post()
    @HttpCode(200)
    async chat(@Body() body: SubmitTurnDto): Promise<TurnResponse> {
        const sessionId = body.sessionId ?? uuidv4();
        const messages = await this.chatService.submitTurn(sessionId, body.prompt);
        return { sessionId, messages: messages.map(toMessageView) };
    }

    @Post('clear')
    @HttpCode(200)
    async clear(@Body() body: SessionDto) {
        await this.chatService.clearSession(body.sessionId);
        return { success: true };
    }

    @Post('files')
    @HttpCode(200)
    @UseInterceptors(FilesInterceptor('files', 10))
    async uploadFiles(@Body() body: SessionDto, @UploadedFiles() files: Express.Multer.File[] = []) {
        const registered = await this.chatService.registerFiles(body.sessionId, files);
        return {
            success: true,
            files: registered.map((file) => ({ name: file.name, size: file.size })),
        };
    }

    @Get('history')
    getHistory(@Query() query: SessionDto): TurnResponse {
        const messages = this.chatService.getHistory(query.sessionId);
        return { sessionId: query.sessionId, messages: messages.map(toMessageView) };
    }
}
