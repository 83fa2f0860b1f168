import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { ServeStaticModule } from '@nestjs/serve-static';
import { resolve } from 'path';
import { ChatModule } from './logic/chat/chat.module';
import { ChatMemoryModule } from './logic/chat-memory/chat-memory.module';
import { SocketGatewayModule } from './logic/socket-gateway/socket-gateway.module';
import { AppEnv, validateEnv } from './utils/env';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    ScheduleModule.forRoot(),
    // the sandbox downloads session files from here
    ServeStaticModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppEnv, true>) => [
        {
          rootPath: resolve(process.cwd(), configService.get('UPLOADS_DIR', { infer: true })),
          serveRoot: '/uploads',
        },
      ],
    }),
    ChatMemoryModule,
    SocketGatewayModule,
    ChatModule,
  ],
})
export class AppModule {}
