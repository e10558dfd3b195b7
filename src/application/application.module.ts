import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { LoggingModule } from '../shared/logging/logging.module';

// Use Cases
import { ProcessUploadsUseCase, GenerateReportUseCase } from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * This module depends on output ports (interfaces) but not on their implementations.
 * The implementations (adapters) are provided by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule, LoggingModule],
  providers: [ProcessUploadsUseCase, GenerateReportUseCase],
  exports: [
    // Export use cases so they can be used by driving adapters (controllers)
    ProcessUploadsUseCase,
    GenerateReportUseCase,
  ],
})
export class ApplicationModule {}
