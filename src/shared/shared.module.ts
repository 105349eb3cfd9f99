import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import Keyv from 'keyv';
import { CacheableMemory } from 'cacheable';
import { LoggerService } from './logger/logger.service';
import { CacheService, MEMORY_STORE } from './cache/cache.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    LoggerService,
    {
      provide: MEMORY_STORE,
      useFactory: () =>
        new Keyv({ store: new CacheableMemory({ ttl: 60_000, lruSize: 5_000 }) }),
    },
    CacheService,
  ],
  exports: [LoggerService, CacheService],
})
export class SharedModule {}
