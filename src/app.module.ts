import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { HealthModule } from './health/health.module';
import { OcrModule } from './ocr/ocr.module';
import { CorrelationIdMiddleware } from './shared/logging/correlation-id.middleware';

/**
 * Application Module
 * HTTP service: image upload → OCR → summary, PDF report and health endpoints
 */
@Module({
  imports: [ConfigModule, SharedModule, OcrModule, HealthModule],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
