import { Body, Controller, Delete, Get, Param, Post, Put } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { Public } from '../../decorators/public.decorator';
import { SpecializationDto } from './dto/specialization.dto';
import { SpecializationView, toSpecializationView } from './specialization.view';
import { SpecializationsService } from './specializations.service';

@ApiTags('Specializations')
@Controller('specialization')
export class SpecializationsController {
  constructor(private readonly service: SpecializationsService) {}

  @Public()
  @Get()
  async findAll(): Promise<SpecializationView[]> {
    const specializations = await this.service.findAll();
    return specializations.map(toSpecializationView);
  }

  @Public()
  @Get(':id')
  async findOne(@Param('id') id: string): Promise<SpecializationView> {
    return toSpecializationView(await this.service.findOne(id));
  }

  @ApiBearerAuth()
  @Post()
  async create(@Body() dto: SpecializationDto): Promise<SpecializationView> {
    return toSpecializationView(await this.service.create(dto));
  }

  @ApiBearerAuth()
  @Put(':id')
  async update(@Param('id') id: string, @Body() dto: SpecializationDto): Promise<SpecializationView> {
    return toSpecializationView(await this.service.update(id, dto));
  }

  @ApiBearerAuth()
  @Delete(':id')
  async remove(@Param('id') id: string): Promise<{ message: string }> {
    await this.service.remove(id);
    return { message: 'Specialization deleted.' };
  }
}
