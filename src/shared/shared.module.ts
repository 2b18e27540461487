import { Module, Global } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { CommonModule } from '../common/common.module';
import { DomainEventPublisher } from './infrastructure/domain-event-publisher';

@Global()
@Module({
    imports: [
        ConfigModule,
        CommonModule,
        EventEmitterModule.forRoot(),
        ScheduleModule.forRoot(),
    ],
    providers: [
        DomainEventPublisher,
    ],
    exports: [
        CommonModule,
        DomainEventPublisher,
    ],
})
export class SharedModule { }
