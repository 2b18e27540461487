import { Module } from '@nestjs/common';
import { CustomLoggerService } from './services';

@Module({
  providers: [
    {
      provide: CustomLoggerService,
      useClass: CustomLoggerService,
    },
  ],
  exports: [CustomLoggerService],
})
export class CommonModule {}
