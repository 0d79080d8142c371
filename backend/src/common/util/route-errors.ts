import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';


/**
 * Error with status code and message. The central error handler in server.ts
 * sends `status` back to the client.
 */
export class RouteError extends Error {
  public status: HttpStatusCodes;

  public constructor(status: HttpStatusCodes, message: string) {
    super(message);
    this.status = status;
    this.name = new.target.name;
  }
}
