import {
  type EmailRecipient,
  InvalidRecipientError,
  isTransientNotificationError,
  NotificationApiUnavailableError,
  NotificationAuthenticationError,
  type NotificationError,
  NotificationGateway,
  type NotificationGatewayService,
  NotificationRateLimitError,
  type NotificationResult,
  type PaymentReceipt,
} from "@workspace/application/notification.gateway";
import { BookingConfig, ResendConfig } from "@workspace/config";
import { Duration, Effect, Layer, Redacted, Schedule } from "effect";
import { Resend } from "resend";
import { AuditLogger } from "../services/audit-logger.js";

const escapeHtml = (str: string): string =>
  str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");

const formatInstant = (date: Date): string =>
  `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;

interface ReceiptLine {
  readonly label: string;
  readonly value: string;
}

const receiptLines = (receipt: PaymentReceipt, currency: string) => {
  const amount = (value: { toFixed(): string }) => `${value.toFixed()} ${currency}`;
  const details: ReadonlyArray<ReceiptLine> = [
    { label: "Reference", value: receipt.reference },
    { label: "Passenger", value: receipt.payerName },
    { label: "Route", value: `${receipt.origin} → ${receipt.destination}` },
    { label: "Departure", value: formatInstant(receipt.departureAt) },
    { label: "Seats", value: String(receipt.seats) },
    { label: "Payment method", value: receipt.paymentMethod },
    { label: "Paid at", value: formatInstant(receipt.paidAt) },
  ];
  const amounts: ReadonlyArray<ReceiptLine> = [
    { label: "Subtotal", value: amount(receipt.subtotal) },
    { label: "Taxes and fees", value: amount(receipt.taxes) },
    { label: "Total paid", value: amount(receipt.total) },
  ];
  return { details, amounts };
};

export const createReceiptEmailHtml = (
  receipt: PaymentReceipt,
  recipientName: string,
  currency: string,
): string => {
  const { details, amounts } = receiptLines(receipt, currency);
  const rows = (lines: ReadonlyArray<ReceiptLine>) =>
    lines
      .map(
        (line) => `
          <tr>
            <td style="padding: 8px 0; color: #718096;">${escapeHtml(line.label)}</td>
            <td style="padding: 8px 0; color: #2d3748; font-weight: bold;">${escapeHtml(line.value)}</td>
          </tr>`,
      )
      .join("");

  return `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Payment Receipt</title>
</head>
<body style="margin: 0; padding: 0; font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; background-color: #f7fafc;">
  <div style="max-width: 600px; margin: 0 auto; padding: 40px 20px;">
    <div style="background: #2b6cb0; border-radius: 12px 12px 0 0; padding: 30px; text-align: center;">
      <h1 style="color: white; margin: 0; font-size: 26px;">Payment Receipt</h1>
      <p style="color: rgba(255,255,255,0.9); margin: 10px 0 0;">Reference ${escapeHtml(receipt.reference)}</p>
    </div>
    <div style="background: white; padding: 30px; border-radius: 0 0 12px 12px;">
      <p style="color: #4a5568; font-size: 16px; line-height: 1.6;">
        Dear <strong>${escapeHtml(recipientName)}</strong>, your payment has been received.
      </p>
      <table style="width: 100%; border-collapse: collapse;">${rows(details)}
      </table>
      <hr style="border: none; border-top: 1px solid #e2e8f0; margin: 20px 0;">
      <table style="width: 100%; border-collapse: collapse;">${rows(amounts)}
      </table>
      <p style="color: #718096; font-size: 14px; margin-top: 30px;">
        Keep this reference for check-in. This is an automated message.
      </p>
    </div>
  </div>
</body>
</html>
  `.trim();
};

export const createReceiptEmailText = (
  receipt: PaymentReceipt,
  recipientName: string,
  currency: string,
): string => {
  const { details, amounts } = receiptLines(receipt, currency);
  const render = (lines: ReadonlyArray<ReceiptLine>) =>
    lines.map((line) => `${line.label}: ${line.value}`).join("\n");

  return [
    "PAYMENT RECEIPT",
    "===============",
    "",
    `Dear ${recipientName}, your payment has been received.`,
    "",
    render(details),
    "",
    render(amounts),
    "",
    "Keep this reference for check-in. This is an automated message.",
  ].join("\n");
};

// --- Resend error mapping ---

const readField = (value: unknown, key: string): unknown =>
  typeof value === "object" && value !== null && key in value
    ? Reflect.get(value, key)
    : undefined;

const AUTH_ERROR_NAMES = new Set([
  "missing_api_key",
  "invalid_api_key",
  "invalid_api_Key",
  "restricted_api_key",
]);

const RATE_LIMIT_ERROR_NAMES = new Set([
  "rate_limit_exceeded",
  "daily_quota_exceeded",
]);

const NETWORK_FAILURE_MARKERS = ["ECONNREFUSED", "ETIMEDOUT", "fetch failed"];

const DEFAULT_RETRY_AFTER_SECONDS = 60;

const readRetryAfter = (headers: unknown): string | undefined => {
  if (headers instanceof Headers) {
    return headers.get("retry-after") ?? undefined;
  }
  const value = readField(headers, "retry-after") ?? readField(headers, "Retry-After");
  return typeof value === "string" ? value : undefined;
};

const parseRetryAfter = (raw: string | undefined, now: number): number => {
  if (raw === undefined) return DEFAULT_RETRY_AFTER_SECONDS;
  const seconds = Number.parseInt(raw, 10);
  if (!Number.isNaN(seconds)) return seconds;
  const date = Date.parse(raw);
  return Number.isNaN(date)
    ? DEFAULT_RETRY_AFTER_SECONDS
    : Math.max(0, Math.ceil((date - now) / 1000));
};

/**
 * Maps a thrown error or a Resend `{ error }` payload onto the notification
 * error set. Anything unrecognised counts as the API being unavailable.
 */
export const mapResendError = (error: unknown, email: string): NotificationError => {
  const statusCode = readField(error, "statusCode");
  const rawName = readField(error, "name");
  const name = typeof rawName === "string" ? rawName : "";
  const rawMessage = readField(error, "message");
  const message = typeof rawMessage === "string" ? rawMessage : "Unknown error";

  if (statusCode === 401 || AUTH_ERROR_NAMES.has(name)) {
    return new NotificationAuthenticationError({
      message: "Invalid Resend API key",
    });
  }

  if (statusCode === 429 || RATE_LIMIT_ERROR_NAMES.has(name)) {
    return new NotificationRateLimitError({
      retryAfterSeconds: parseRetryAfter(
        readRetryAfter(readField(error, "headers")),
        Date.now(),
      ),
    });
  }

  if (
    statusCode === 422 ||
    ((statusCode === 400 || name === "validation_error") &&
      message.toLowerCase().includes("email"))
  ) {
    return new InvalidRecipientError({ email, reason: message });
  }

  if (
    name === "TimeoutError" ||
    NETWORK_FAILURE_MARKERS.some((marker) => message.includes(marker))
  ) {
    return new NotificationApiUnavailableError({
      message: "Network error: Unable to reach Resend API",
      cause: error,
    });
  }

  return new NotificationApiUnavailableError({ message, cause: error });
};

export const maskEmail = (email: string): string => {
  const [local, domain] = email.split("@");
  if (!local || !domain) return email;
  const maskedLocal =
    local.length <= 2 ? local : `${local[0]}***${local.at(-1)}`;
  return `${maskedLocal}@${domain}`;
};

/**
 * Resend implementation of the NotificationGateway.
 */
export const ResendReceiptGatewayCreateLive = (
  config: ResendConfig,
  currency: string,
) =>
  Layer.effect(
    NotificationGateway,
    Effect.gen(function* () {
      const auditLogger = yield* AuditLogger;
      const resend = new Resend(Redacted.value(config.apiKey));

      const retryPolicy = Schedule.exponential("500 millis").pipe(
        Schedule.intersect(Schedule.recurs(config.maxRetries)),
        Schedule.whileInput(isTransientNotificationError),
      );

      const sendReceipt: NotificationGatewayService["sendReceipt"] = (
        receipt: PaymentReceipt,
        recipient: EmailRecipient,
      ) =>
        Effect.gen(function* () {
          yield* Effect.logInfo("Sending payment receipt", {
            reference: receipt.reference,
            recipientEmail: maskEmail(recipient.email),
          });

          const recipientName = recipient.name ?? receipt.payerName;

          const result = yield* Effect.tryPromise({
            try: () =>
              resend.emails.send({
                from: config.fromEmail,
                to: [recipient.email],
                subject: `Payment receipt - ${receipt.reference}`,
                html: createReceiptEmailHtml(receipt, recipientName, currency),
                text: createReceiptEmailText(receipt, recipientName, currency),
              }),
            catch: (error) => mapResendError(error, recipient.email),
          }).pipe(
            Effect.timeoutFail({
              duration: Duration.seconds(config.timeout),
              onTimeout: () =>
                new NotificationApiUnavailableError({
                  message: `Resend did not answer within ${config.timeout}s`,
                }),
            }),
            Effect.flatMap((response) =>
              response.error
                ? Effect.fail(mapResendError(response.error, recipient.email))
                : Effect.succeed(response),
            ),
            Effect.retry(retryPolicy),
          );

          if (!result.data?.id) {
            return yield* Effect.fail(
              new NotificationApiUnavailableError({
                message: "Resend API returned no message ID",
              }),
            );
          }

          yield* Effect.logInfo("Payment receipt sent", {
            messageId: result.data.id,
            reference: receipt.reference,
          });

          yield* auditLogger.log({
            aggregateType: "Payment",
            aggregateId: receipt.paymentId,
            operation: "UPDATE",
            changes: {
              notificationSent: "PaymentReceipt",
              recipientEmail: maskEmail(recipient.email),
            },
          });

          return { messageId: result.data.id } satisfies NotificationResult;
        });

      return NotificationGateway.of({ sendReceipt });
    }),
  );

/**
 * Live Layer: Implementation using Resend API.
 */
export const ResendReceiptGatewayLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* ResendConfig;
    const booking = yield* BookingConfig;
    return ResendReceiptGatewayCreateLive(config, booking.currency);
  }),
);
