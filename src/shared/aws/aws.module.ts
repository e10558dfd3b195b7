import { Module } from '@nestjs/common';
import { S3Module } from './s3/s3.module';

/**
 * AWS clients shared across the application. Only S3 is needed here.
 */
@Module({
  imports: [S3Module],
  exports: [S3Module],
})
export class AwsModule {}
