import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SpecializationEntity } from '../specializations/entities/specialization.entity';
import { CourseItemEntity } from './entities/course-item.entity';
import { CourseItemsController } from './course-items.controller';
import { CourseItemsService } from './course-items.service';

@Module({
  imports: [TypeOrmModule.forFeature([CourseItemEntity, SpecializationEntity])],
  controllers: [CourseItemsController],
  providers: [CourseItemsService],
})
export class CourseItemsModule {}
