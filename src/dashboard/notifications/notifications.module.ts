import { Global, Module } from '@nestjs/common';
import { ChangeNotifierService } from './change-notifier.service';

@Global()
@Module({
  providers: [ChangeNotifierService],
  exports: [ChangeNotifierService],
})
export class NotificationsModule {}
