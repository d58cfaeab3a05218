import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Inject,
  Param,
  Post,
  StreamableFile,
} from '@nestjs/common';
import type { ObjectId } from 'mongodb';
import { toHttpException } from '../../lib/errors/http';
import { ParseObjectIdPipe } from '../../lib/http/object-id.pipe';
import { BLOB_STORE, type BlobStore } from './blob-store';
import { UploadFileRequestDto } from './dto/UploadFile.request.dto';
import type { UploadFileResponseDto } from './dto/UploadFile.response.dto';

@Controller('api/files')
export class FilesController {
  public constructor(@Inject(BLOB_STORE) private readonly store: BlobStore) {}

  @Post()
  public async upload(@Body() body: UploadFileRequestDto): Promise<UploadFileResponseDto> {
    try {
      const id = await this.store.upload(body.name, Buffer.from(body.contentBase64, 'base64'));
      return { id: id.toHexString() };
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Get(':id')
  public async download(@Param('id', ParseObjectIdPipe) id: ObjectId): Promise<StreamableFile> {
    try {
      const bytes = await this.store.download(id);
      return new StreamableFile(bytes, { type: 'application/octet-stream' });
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Delete(':id')
  @HttpCode(204)
  public async remove(@Param('id', ParseObjectIdPipe) id: ObjectId): Promise<void> {
    try {
      await this.store.delete(id);
    } catch (err) {
      throw toHttpException(err);
    }
  }
}
