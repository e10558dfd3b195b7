import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '../../config/config.module';
import { PinoLoggerService } from './pino-logger.service';

/**
 * Provides the pino-backed logger everywhere; main.ts also installs it as the Nest logger.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [PinoLoggerService],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
