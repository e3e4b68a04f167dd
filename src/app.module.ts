import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AppController } from './app.controller';
import { BotModule } from './bot/bot.module';
import { botConfig } from './config/bot.config';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, cache: true, load: [botConfig] }),
    BotModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
