import { Body, Controller, Get, HttpCode, HttpStatus, Post, UnauthorizedException } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { Public } from '../../decorators/public.decorator';
import { User } from '../../decorators/user.decorator';
import { JwtPayload } from '../../interfaces/jwt-payload.interface';
import { UserCredentialsDto } from './dto/user-credentials.dto';
import { LoginView, toUserView, UserView } from './user.view';
import { UsersService } from './users.service';

@ApiTags('Users')
@Controller()
export class UsersController {
  constructor(private readonly service: UsersService) {}

  @Public()
  @Post('register')
  @HttpCode(HttpStatus.OK)
  async register(@Body() dto: UserCredentialsDto): Promise<UserView> {
    return toUserView(await this.service.register(dto));
  }

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: UserCredentialsDto): Promise<LoginView> {
    return this.service.login(dto);
  }

  @ApiBearerAuth()
  @Get('user')
  async me(@User() user: JwtPayload | undefined): Promise<UserView> {
    if (!user) {
      throw new UnauthorizedException();
    }
    return toUserView(await this.service.findById(Number(user.sub)));
  }
}
