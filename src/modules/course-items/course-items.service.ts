import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { newEntityId } from '../../database/ids';
import { isUniqueViolation } from '../../database/query-errors';
import { TransactionRunner } from '../../database/transaction.runner';
import { SpecializationEntity } from '../specializations/entities/specialization.entity';
import { CreateCourseItemDto, UpdateCourseItemDto } from './dto/course-item.dto';
import { CourseItemEntity } from './entities/course-item.entity';

const DUPLICATE = 'Course item already exists.';
const NOT_FOUND = 'Course item not found.';
const SPECIALIZATION_NOT_FOUND = 'Specialization not found.';

@Injectable()
export class CourseItemsService {
  private readonly log = new Logger(CourseItemsService.name);

  constructor(
    @InjectRepository(CourseItemEntity)
    private readonly courseItems: Repository<CourseItemEntity>,
    private readonly transactions: TransactionRunner,
  ) {}

  findAll(): Promise<CourseItemEntity[]> {
    return this.courseItems.find({ relations: { specialization: true } });
  }

  async findOne(id: string): Promise<CourseItemEntity> {
    const item = await this.courseItems.findOne({ where: { id }, relations: { specialization: true } });
    if (!item) {
      throw new NotFoundException(NOT_FOUND);
    }
    return item;
  }

  async create(dto: CreateCourseItemDto): Promise<CourseItemEntity> {
    const created = await this.write(async (manager) => {
      const specialization = await manager
        .getRepository(SpecializationEntity)
        .findOneBy({ id: dto.specialization_id });
      if (!specialization) {
        throw new NotFoundException(SPECIALIZATION_NOT_FOUND);
      }

      const items = manager.getRepository(CourseItemEntity);
      if (await items.findOneBy({ name: dto.name, specializationId: specialization.id })) {
        throw new BadRequestException(DUPLICATE);
      }

      const saved = await items.save(
        items.create({
          id: newEntityId(),
          name: dto.name,
          type: dto.type,
          specializationId: specialization.id,
        }),
      );
      saved.specialization = specialization;
      return saved;
    });

    this.log.log(`Created course item ${created.id} in specialization ${created.specializationId}`);
    return created;
  }

  async update(id: string, dto: UpdateCourseItemDto): Promise<CourseItemEntity> {
    await this.write(async (manager) => {
      const items = manager.getRepository(CourseItemEntity);
      const current = await items.findOneBy({ id });
      if (!current) {
        throw new NotFoundException(NOT_FOUND);
      }

      const next = {
        name: dto.name ?? current.name,
        type: dto.type ?? current.type,
        specializationId: dto.specialization_id ?? current.specializationId,
      };

      const moved = next.specializationId !== current.specializationId;
      if (moved && !(await manager.getRepository(SpecializationEntity).findOneBy({ id: next.specializationId }))) {
        throw new NotFoundException(SPECIALIZATION_NOT_FOUND);
      }

      if (moved || next.name !== current.name) {
        const clash = await items.findOneBy({ name: next.name, specializationId: next.specializationId });
        if (clash && clash.id !== id) {
          throw new BadRequestException(DUPLICATE);
        }
      }

      await items.update({ id }, next);
    });

    return this.findOne(id);
  }

  async remove(id: string): Promise<void> {
    await this.transactions.run(async (manager) => {
      const items = manager.getRepository(CourseItemEntity);
      if (!(await items.findOneBy({ id }))) {
        throw new NotFoundException(NOT_FOUND);
      }
      await items.delete({ id });
    });
    this.log.log(`Deleted course item ${id}`);
  }

  private async write<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    try {
      return await this.transactions.run(work);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new BadRequestException(DUPLICATE);
      }
      throw error;
    }
  }
}
