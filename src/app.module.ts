import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AppController } from './app.controller';
import appConfig from './config/app.config';
import spaceTrackConfig from './config/space-track.config';
import { DebrisService } from './debris.service';
import { EnrichmentService } from './enrichment.service';
import { SpaceTrackSession } from './space-track.session';
import { HTTP_FETCH, defaultFetch } from './utils/http-client';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [appConfig, spaceTrackConfig] }),
  ],
  controllers: [AppController],
  providers: [
    { provide: HTTP_FETCH, useValue: defaultFetch },
    SpaceTrackSession,
    EnrichmentService,
    DebrisService,
  ],
})
export class AppModule {}
