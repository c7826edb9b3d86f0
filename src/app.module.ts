import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule } from '@nestjs/config';
import configuration from './common/config/configuration';

// Providers
import { ElevenLabsModule } from './providers/elevenlabs/elevenlabs.module';

// Business Modules
import { SessionsModule } from './modules/sessions/sessions.module';
import { TranscriptsModule } from './modules/transcripts/transcripts.module';
import { TranscriptionsModule } from './modules/transcriptions/transcriptions.module';
import { ExportsModule } from './modules/exports/exports.module';

// Guards
import { SessionGuard } from './common/guards/session.guard';

@Module({
  imports: [
    // Config
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),

    // Schedule (会话清理)
    ScheduleModule.forRoot(),

    // Providers
    ElevenLabsModule,

    // Business Modules
    SessionsModule,
    TranscriptsModule,
    TranscriptionsModule,
    ExportsModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: SessionGuard,
    },
  ],
})
export class AppModule {}
