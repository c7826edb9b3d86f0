import { BadRequestException, NotFoundException, PayloadTooLargeException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { HttpExceptionFilter } from './http-exception.filter';

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter();

  const catchWith = (exception: unknown) => {
    const reply = {
      status: jest.fn().mockReturnThis(),
      send: jest.fn(),
    };
    filter.catch(exception, new ExecutionContextHost([{}, reply]));
    return reply;
  };

  it('keeps the code and details thrown by services', () => {
    const reply = catchWith(
      new BadRequestException({
        code: 'INVALID_INPUT',
        message: 'Unsupported file type: notes.txt',
        details: { allowed: ['mp3', 'wav'] },
      }),
    );

    expect(reply.status).toHaveBeenCalledWith(400);
    expect(reply.send).toHaveBeenCalledWith({
      data: null,
      error: {
        code: 'INVALID_INPUT',
        message: 'Unsupported file type: notes.txt',
        details: { allowed: ['mp3', 'wav'] },
      },
    });
  });

  it('joins validation messages', () => {
    const reply = catchWith(
      new BadRequestException(['property foo should not exist', 'demo_mode must be a boolean value']),
    );

    expect(reply.send).toHaveBeenCalledWith({
      data: null,
      error: {
        code: 'INVALID_INPUT',
        message: 'property foo should not exist; demo_mode must be a boolean value',
        details: {
          errors: ['property foo should not exist', 'demo_mode must be a boolean value'],
        },
      },
    });
  });

  it('maps bare http exceptions by status', () => {
    expect(catchWith(new NotFoundException()).send).toHaveBeenCalledWith({
      data: null,
      error: { code: 'NOT_FOUND', message: 'Not Found' },
    });
    expect(catchWith(new PayloadTooLargeException()).send).toHaveBeenCalledWith({
      data: null,
      error: { code: 'PAYLOAD_TOO_LARGE', message: 'Payload Too Large' },
    });
  });

  it('passes through client errors raised by fastify plugins', () => {
    const error = Object.assign(new Error('request file too large'), { statusCode: 413 });
    const reply = catchWith(error);

    expect(reply.status).toHaveBeenCalledWith(413);
    expect(reply.send).toHaveBeenCalledWith({
      data: null,
      error: { code: 'PAYLOAD_TOO_LARGE', message: 'request file too large' },
    });
  });

  it('hides unexpected errors behind a 500', () => {
    const reply = catchWith('boom');

    expect(reply.status).toHaveBeenCalledWith(500);
    expect(reply.send).toHaveBeenCalledWith({
      data: null,
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });
});
