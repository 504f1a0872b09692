import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  Req,
  Res,
  UnauthorizedException,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';

import { AdminSessionService } from './admin-session.service';
import { LoginThrottleService } from './login-throttle.service';
import { AdminSessionError, IssuedAdminSession } from './types';

type LoginBody = {
  username?: unknown;
  password?: unknown;
};

@Controller('admin')
export class AdminAuthController {
  private readonly logger = new Logger(AdminAuthController.name);

  constructor(
    private readonly adminSessionService: AdminSessionService,
    private readonly loginThrottle: LoginThrottleService,
  ) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(
    @Req() request: FastifyRequest,
    @Body() body: LoginBody,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): IssuedAdminSession {
    const attempt = this.loginThrottle.consume(request.ip);
    if (!attempt.allowed) {
      reply.header('retry-after', String(attempt.retryAfter));
      this.logger.warn(JSON.stringify({ event: 'admin_login', result: 'throttled', ip: request.ip }));
      throw new HttpException('Too many login attempts', HttpStatus.TOO_MANY_REQUESTS);
    }

    const username = typeof body?.username === 'string' ? body.username : '';
    const password = typeof body?.password === 'string' ? body.password : '';
    if (username.length === 0 || password.length === 0) {
      throw new BadRequestException('username and password are required');
    }

    try {
      const session = this.adminSessionService.issue(username, password);
      this.logger.log(JSON.stringify({ event: 'admin_login', result: 'ok', ip: request.ip }));
      return session;
    } catch (error) {
      if (error instanceof AdminSessionError) {
        this.logger.warn(
          JSON.stringify({ event: 'admin_login', result: 'error', reason: error.reason, ip: request.ip }),
        );
        throw new UnauthorizedException('Invalid credentials');
      }
      throw error;
    }
  }
}
