import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { newEntityId } from '../../database/ids';
import { isUniqueViolation } from '../../database/query-errors';
import { TransactionRunner } from '../../database/transaction.runner';
import { CourseItemEntity } from '../course-items/entities/course-item.entity';
import { SpecializationDto } from './dto/specialization.dto';
import { SpecializationEntity } from './entities/specialization.entity';

const DUPLICATE = 'Specialization already exists.';
const NOT_FOUND = 'Specialization not found.';

@Injectable()
export class SpecializationsService {
  private readonly log = new Logger(SpecializationsService.name);

  constructor(
    @InjectRepository(SpecializationEntity)
    private readonly specializations: Repository<SpecializationEntity>,
    private readonly transactions: TransactionRunner,
  ) {}

  findAll(): Promise<SpecializationEntity[]> {
    return this.specializations.find({ relations: { courseItems: true } });
  }

  async findOne(id: string): Promise<SpecializationEntity> {
    const specialization = await this.specializations.findOne({
      where: { id },
      relations: { courseItems: true },
    });
    if (!specialization) {
      throw new NotFoundException(NOT_FOUND);
    }
    return specialization;
  }

  async create(dto: SpecializationDto): Promise<SpecializationEntity> {
    const created = await this.write(async (manager) => {
      const repo = manager.getRepository(SpecializationEntity);
      if (await repo.findOneBy({ name: dto.name })) {
        throw new BadRequestException(DUPLICATE);
      }
      return repo.save(repo.create({ id: newEntityId(), name: dto.name }));
    });

    this.log.log(`Created specialization ${created.id}`);
    created.courseItems = [];
    return created;
  }

  async update(id: string, dto: SpecializationDto): Promise<SpecializationEntity> {
    await this.write(async (manager) => {
      const repo = manager.getRepository(SpecializationEntity);
      if (!(await repo.findOneBy({ id }))) {
        throw new NotFoundException(NOT_FOUND);
      }
      const clash = await repo.findOneBy({ name: dto.name });
      if (clash && clash.id !== id) {
        throw new BadRequestException(DUPLICATE);
      }
      await repo.update({ id }, { name: dto.name });
    });

    return this.findOne(id);
  }

  /** Removes the specialization and every course item that belongs to it. */
  async remove(id: string): Promise<void> {
    const removedItems = await this.transactions.run(async (manager) => {
      const repo = manager.getRepository(SpecializationEntity);
      if (!(await repo.findOneBy({ id }))) {
        throw new NotFoundException(NOT_FOUND);
      }
      const { affected } = await manager.getRepository(CourseItemEntity).delete({ specializationId: id });
      await repo.delete({ id });
      return affected ?? 0;
    });

    this.log.log(`Deleted specialization ${id} with ${removedItems} course item(s)`);
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
