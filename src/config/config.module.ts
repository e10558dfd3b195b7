import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

/**
 * Global typed configuration.
 * `.env.local` overrides `.env`; neither is read under NODE_ENV=test.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      ignoreEnvFile: process.env.NODE_ENV === 'test',
      load: [configuration],
      cache: true,
    }),
  ],
})
export class ConfigModule {}
