import { Injectable } from "@nestjs/common";
import Busboy from "busboy";
import { IncomingHttpHeaders } from "http";

/**
 * Factory service for creating Busboy instances
 * Tests replace it to drive the multipart events by hand.
 */
@Injectable()
export class BusboyFactory {
  /**
   * Creates a new Busboy instance
   *
   * @param headers - HTTP headers from the request
   * @param limits - Parser limits; `fileSize` truncates each file stream
   * @returns A new Busboy instance
   * @throws Error when the content type is not multipart or lacks a boundary
   */
  create(headers: IncomingHttpHeaders, limits: Busboy.Limits): Busboy.Busboy {
    return Busboy({ headers, limits });
  }
}
