import { ConflictException, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { compare, hash } from 'bcrypt';
import { Repository } from 'typeorm';
import { isUniqueViolation } from '../../database/query-errors';
import { TokenService } from '../../guards/token.service';
import { UserCredentialsDto } from './dto/user-credentials.dto';
import { UserEntity } from './entities/user.entity';
import { LoginView } from './user.view';

const INVALID_CREDENTIALS = 'Invalid username or password.';

@Injectable()
export class UsersService {
  private readonly log = new Logger(UsersService.name);

  constructor(
    @InjectRepository(UserEntity)
    private readonly users: Repository<UserEntity>,
    private readonly tokens: TokenService,
    private readonly config: ConfigService,
  ) {}

  async register(dto: UserCredentialsDto): Promise<UserEntity> {
    if (await this.users.findOneBy({ username: dto.username })) {
      throw new ConflictException('Username already exists.');
    }

    const rounds = Number(this.config.get<number | string>('BCRYPT_ROUNDS') ?? 10);
    const password = await hash(dto.password, rounds);

    let user: UserEntity;
    try {
      user = await this.users.save(this.users.create({ username: dto.username, password }));
    } catch (error) {
      // lost a race against a concurrent registration
      if (isUniqueViolation(error)) {
        throw new ConflictException('Username already exists.');
      }
      throw error;
    }

    this.log.log(`Registered user ${user.id}`);
    return user;
  }

  /**
   * Checks a username/password pair. Unknown users and wrong passwords fail
   * with the same error so the response does not reveal which usernames exist.
   */
  async verify(dto: UserCredentialsDto): Promise<UserEntity> {
    const user = await this.users.findOne({
      where: { username: dto.username },
      select: { id: true, username: true, password: true },
    });

    if (!user || !(await compare(dto.password, user.password))) {
      throw new UnauthorizedException(INVALID_CREDENTIALS);
    }
    return user;
  }

  async login(dto: UserCredentialsDto): Promise<LoginView> {
    const user = await this.verify(dto);
    const accessToken = await this.tokens.issue(user);
    this.log.log(`Issued access token for user ${user.id}`);
    return { access_token: accessToken, user_id: user.id, username: user.username };
  }

  async findById(id: number): Promise<UserEntity> {
    const user = Number.isInteger(id) ? await this.users.findOneBy({ id }) : null;
    if (!user) {
      throw new NotFoundException('User not found.');
    }
    return user;
  }
}
