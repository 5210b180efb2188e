import { ArgumentsHost, BadRequestException } from '@nestjs/common';
import { HttpExceptionFilter } from './http-exception.filter';
import { Logger } from '../interceptors/logging.interceptor';
import { AlreadyResolvedException, JoinCodeInvalidException } from '../../onboarding/exceptions/onboarding.exceptions';

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter();
  let json: jest.Mock;
  let status: jest.Mock;
  let host: ArgumentsHost;

  beforeEach(() => {
    jest.spyOn(Logger, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger, 'error').mockImplementation(() => undefined);
    json = jest.fn();
    status = jest.fn().mockReturnValue({ json });
    const http: any = {
      getResponse: () => ({ status }),
      getRequest: () => ({ method: 'POST', url: '/api/v1/onboarding/join' }),
    };
    host = { switchToHttp: () => http } as any;
  });

  afterEach(() => jest.restoreAllMocks());

  it('maps an invalid join code to 400 with its message', () => {
    filter.catch(new JoinCodeInvalidException(), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json.mock.calls[0][0]).toMatchObject({
      statusCode: 400,
      path: '/api/v1/onboarding/join',
      message: 'Invalid or expired join code',
    });
  });

  it('maps an already resolved user to 409', () => {
    filter.catch(new AlreadyResolvedException('u1'), host);

    expect(status).toHaveBeenCalledWith(409);
    expect(json.mock.calls[0][0].message).toBe('User u1 has already been approved or rejected');
    expect(Logger.warn).toHaveBeenCalled();
  });

  it('keeps every validation message', () => {
    filter.catch(new BadRequestException(['email must be an email', 'password is too short']), host);

    expect(json.mock.calls[0][0].message).toEqual(['email must be an email', 'password is too short']);
  });

  it('hides the details of unexpected errors', () => {
    filter.catch(new TypeError('db exploded'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json.mock.calls[0][0]).toMatchObject({
      statusCode: 500,
      error: 'TypeError',
      message: 'Internal server error',
    });
    expect(Logger.error).toHaveBeenCalled();
  });
});
