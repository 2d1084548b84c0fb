import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { StudentsModule } from './student/student.module';
import { MenuModule } from './menu/menu.module';
import { AppService } from './app.service';

@Module({
  imports: [ConfigModule, DatabaseModule, StudentsModule, MenuModule],
  providers: [AppService],
})
export class AppModule {}
