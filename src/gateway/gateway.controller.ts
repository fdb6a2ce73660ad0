import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import type { Request } from 'express';
import { DataResponse } from './responses';
import { GatewayService } from './gateway.service';
import { SenderService } from './sender.service';
import { SendMsgDto } from './dto/send-msg.dto';
import { InternalTokenGuard } from './guards/internal-token.guard';

export function flattenHeaders(headers: Request['headers']): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    out[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

@Controller()
export class GatewayController {
  private readonly log = new Logger(GatewayController.name);

  constructor(
    private readonly gateway: GatewayService,
    private readonly sender: SenderService,
  ) {}

  /**
   * Channel webhooks. Bodies under /c arrive as raw text (see main.ts) so
   * handlers decode and validate them themselves.
   */
  @Post('c/:type/:uuid/:action')
  @HttpCode(HttpStatus.OK)
  async webhook(
    @Param('type') type: string,
    @Param('uuid', new ParseUUIDPipe()) uuid: string,
    @Param('action') action: string,
    @Req() req: Request,
    @Body() body: unknown,
  ): Promise<DataResponse> {
    const result = await this.gateway.handleWebhook({
      channelType: type,
      channelUuid: uuid,
      action,
      method: req.method,
      url: req.originalUrl,
      body: typeof body === 'string' ? body : '',
      headers: flattenHeaders(req.headers),
    });

    if (result.statusCode !== HttpStatus.OK) {
      this.log.debug(`[${type}/${action}] ${uuid} -> ${result.statusCode}`);
      throw new HttpException(result.response, result.statusCode);
    }
    return result.response;
  }

  /**
   * Host-internal send of one outgoing message through its channel handler.
   */
  @Post('internal/send')
  @UseGuards(InternalTokenGuard)
  @HttpCode(HttpStatus.OK)
  async send(@Body() dto: SendMsgDto) {
    const msg = await this.sender.toOutgoing(dto);
    const status = await this.sender.send(msg);

    return {
      ok: status.status !== 'errored',
      data: {
        msg_id: msg.id,
        status: status.status,
        logs: status.logs.length,
      },
    };
  }
}
