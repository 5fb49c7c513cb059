import chalk from "chalk";

import { maskSensitiveHeaders } from "../utils/http/headerUtils.js";

import type { RequestError } from "../errors.js";
import type { HeaderRecord } from "../message/HeaderBag.js";

function formatMethod(method: string): string {
  const upperMethod = method.toUpperCase();

  switch (upperMethod) {
    case "GET":
      return chalk.green(upperMethod);
    case "POST":
      return chalk.yellow(upperMethod);
    case "PUT":
      return chalk.blue(upperMethod);
    case "DELETE":
      return chalk.red(upperMethod);
    case "PATCH":
      return chalk.cyan(upperMethod);
    default:
      return chalk.white(upperMethod);
  }
}

function getStatusColor(status: number): typeof chalk.red {
  if (status >= 500) {return chalk.red;}
  if (status >= 400) {return chalk.yellow;}
  if (status >= 300) {return chalk.cyan;}
  if (status >= 200) {return chalk.green;}
  return chalk.white;
}

export function describeRequest(
  method: string,
  url: string,
  version: string,
  headers: HeaderRecord,
): string {
  const masked = maskSensitiveHeaders(headers);
  const headerText = Object.keys(masked).length > 0
    ? ` ${chalk.dim(JSON.stringify(masked))}`
    : "";

  return `${chalk.blue("➤")} ${formatMethod(method)} ${chalk.cyan(url)} ${chalk.dim(`HTTP/${version}`)}${headerText}`;
}

export function describeResponse(
  statusCode: number,
  reasonPhrase: string,
  duration?: number,
): string {
  const statusColor = getStatusColor(statusCode);
  let output = `${chalk.blue("⮑")} ${statusColor(`${statusCode} ${reasonPhrase}`)}`;

  if (duration !== undefined) {
    output += ` ${chalk.dim("in")} ${chalk.magenta(duration + "ms")}`;
  }

  return output;
}

export function describeFailure(error: RequestError): string {
  return `${chalk.red("✗")} ${chalk.red(error.message)}`;
}
