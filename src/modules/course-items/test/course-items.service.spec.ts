import { BadRequestException, NotFoundException } from '@nestjs/common';
import { asRepository, DataSourceMock, makeDataSourceMock, makeRepoMock, RepoMock } from 'test/test-utils';
import { TransactionRunner } from '../../../database/transaction.runner';
import { SpecializationEntity } from '../../specializations/entities/specialization.entity';
import { CourseItemsService } from '../course-items.service';
import { CourseItemEntity } from '../entities/course-item.entity';

const dataScience: SpecializationEntity = { id: 's1', name: 'Data Science' };
const intro: CourseItemEntity = { id: 'c1', name: 'Intro', type: 'Course', specializationId: 's1' };

describe('CourseItemsService', () => {
  let courseItems: RepoMock<CourseItemEntity>;
  let specializations: RepoMock<SpecializationEntity>;
  let db: DataSourceMock;
  let service: CourseItemsService;

  beforeEach(() => {
    courseItems = makeRepoMock<CourseItemEntity>();
    specializations = makeRepoMock<SpecializationEntity>();
    db = makeDataSourceMock([
      [CourseItemEntity, courseItems],
      [SpecializationEntity, specializations],
    ]);
    service = new CourseItemsService(asRepository(courseItems), new TransactionRunner(db.dataSource));
  });

  describe('create', () => {
    it('stores the item under an existing specialization', async () => {
      specializations.findOneBy.mockResolvedValueOnce(dataScience);

      const created = await service.create({ name: 'Intro', type: 'Course', specialization_id: 's1' });

      expect(courseItems.findOneBy).toHaveBeenCalledWith({ name: 'Intro', specializationId: 's1' });
      expect(created).toEqual({
        id: expect.stringMatching(/^[0-9a-f]{32}$/),
        name: 'Intro',
        type: 'Course',
        specializationId: 's1',
        specialization: dataScience,
      });
    });

    it('rejects an unknown specialization and creates nothing', async () => {
      await expect(
        service.create({ name: 'Intro', type: 'Course', specialization_id: 'missing' }),
      ).rejects.toThrow(new NotFoundException('Specialization not found.'));
      expect(courseItems.save).not.toHaveBeenCalled();
    });

    it('rejects a name already used inside the same specialization', async () => {
      specializations.findOneBy.mockResolvedValueOnce(dataScience);
      courseItems.findOneBy.mockResolvedValueOnce(intro);

      await expect(
        service.create({ name: 'Intro', type: 'Lab', specialization_id: 's1' }),
      ).rejects.toThrow(new BadRequestException('Course item already exists.'));
      expect(courseItems.save).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('keeps omitted fields at their stored values', async () => {
      courseItems.findOneBy.mockResolvedValueOnce(intro);
      courseItems.findOne.mockResolvedValueOnce({ ...intro, type: 'Lab', specialization: dataScience });

      const updated = await service.update('c1', { type: 'Lab' });

      expect(courseItems.update).toHaveBeenCalledWith(
        { id: 'c1' },
        { name: 'Intro', type: 'Lab', specializationId: 's1' },
      );
      // neither the name nor the specialization changed, so no uniqueness lookup
      expect(courseItems.findOneBy).toHaveBeenCalledTimes(1);
      expect(updated.type).toBe('Lab');
    });

    it('refuses to move an item to a specialization that does not exist', async () => {
      courseItems.findOneBy.mockResolvedValueOnce(intro);

      await expect(service.update('c1', { specialization_id: 'missing' })).rejects.toThrow(
        new NotFoundException('Specialization not found.'),
      );
      expect(specializations.findOneBy).toHaveBeenCalledWith({ id: 'missing' });
      expect(courseItems.update).not.toHaveBeenCalled();
    });

    it('refuses a rename that collides inside the specialization', async () => {
      courseItems.findOneBy
        .mockResolvedValueOnce(intro)
        .mockResolvedValueOnce({ id: 'c2', name: 'Advanced', type: 'Course', specializationId: 's1' });

      await expect(service.update('c1', { name: 'Advanced' })).rejects.toThrow(
        new BadRequestException('Course item already exists.'),
      );
      expect(courseItems.update).not.toHaveBeenCalled();
    });

    it('throws NotFound for an unknown item', async () => {
      await expect(service.update('missing', { name: 'Anything' })).rejects.toThrow(
        new NotFoundException('Course item not found.'),
      );
    });
  });

  describe('remove', () => {
    it('deletes an existing item', async () => {
      courseItems.findOneBy.mockResolvedValueOnce(intro);

      await service.remove('c1');

      expect(courseItems.delete).toHaveBeenCalledWith({ id: 'c1' });
    });

    it('throws NotFound for an unknown item', async () => {
      await expect(service.remove('missing')).rejects.toBeInstanceOf(NotFoundException);
      expect(courseItems.delete).not.toHaveBeenCalled();
    });
  });

  it('findAll lists every item with its parent specialization', async () => {
    courseItems.find.mockResolvedValueOnce([{ ...intro, specialization: dataScience }]);

    await expect(service.findAll()).resolves.toEqual([{ ...intro, specialization: dataScience }]);
    expect(courseItems.find).toHaveBeenCalledWith({ relations: { specialization: true } });
  });

  it('findOne loads the parent specialization', async () => {
    courseItems.findOne.mockResolvedValueOnce({ ...intro, specialization: dataScience });

    await expect(service.findOne('c1')).resolves.toMatchObject({ specialization: { name: 'Data Science' } });
    expect(courseItems.findOne).toHaveBeenCalledWith({ where: { id: 'c1' }, relations: { specialization: true } });
  });
});
