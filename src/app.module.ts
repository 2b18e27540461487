import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import bookingConfig from './common/config/booking.config';
import { BookingDddModule } from './modules/booking/booking-ddd.module';
import { SharedModule } from './shared/shared.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [bookingConfig],
    }),
    SharedModule,
    BookingDddModule,
  ],
})
export class AppModule {}
