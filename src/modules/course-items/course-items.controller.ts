import { Body, Controller, Delete, Get, Param, Post, Put } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Public } from '../../decorators/public.decorator';
import { CourseItemView, toCourseItemView } from './course-item.view';
import { CourseItemsService } from './course-items.service';
import { CreateCourseItemDto, UpdateCourseItemDto } from './dto/course-item.dto';

// Course item writes are open to anonymous callers; see DESIGN.md.
@ApiTags('Course items')
@Public()
@Controller('course_item')
export class CourseItemsController {
  constructor(private readonly service: CourseItemsService) {}

  @Get()
  async findAll(): Promise<CourseItemView[]> {
    const items = await this.service.findAll();
    return items.map(toCourseItemView);
  }

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<CourseItemView> {
    return toCourseItemView(await this.service.findOne(id));
  }

  @Post()
  async create(@Body() dto: CreateCourseItemDto): Promise<CourseItemView> {
    return toCourseItemView(await this.service.create(dto));
  }

  @Put(':id')
  async update(@Param('id') id: string, @Body() dto: UpdateCourseItemDto): Promise<CourseItemView> {
    return toCourseItemView(await this.service.update(id, dto));
  }

  @Delete(':id')
  async remove(@Param('id') id: string): Promise<{ message: string }> {
    await this.service.remove(id);
    return { message: 'Course item deleted.' };
  }
}
