import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

@Entity({ name: 'users' })
@Unique(['username'])
export class UserEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 80 })
  username!: string;

  // bcrypt hash; only loaded when asked for explicitly
  @Column({ type: 'varchar', length: 256, select: false })
  password!: string;
}
