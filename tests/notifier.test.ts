import { describe, it, expect, beforeAll, afterAll } from "vitest";
import nodemailer from "nodemailer";
import { EmailNotifier, type MailTransport } from "../src/notify/emailNotifier.js";
import { renderArchiveReadyMessage, recordLink } from "../src/notify/messages.js";
import { NotificationTimeoutError, withTimeout } from "../src/notify/notifier.js";
import { setupLogging, teardownLogging } from "../src/logging.js";
import { captureSink, sampleRequest } from "./support/fakes.js";

function jsonMailbox(): { transport: MailTransport; messages: unknown[] } {
  const json = nodemailer.createTransport({ jsonTransport: true });
  const messages: unknown[] = [];
  return {
    messages,
    transport: {
      sendMail: async (options) => {
        const info = await json.sendMail(options);
        messages.push(JSON.parse(info.message));
        return info;
      }
    }
  };
}

describe("EmailNotifier", () => {
  beforeAll(async () => {
    await setupLogging({ level: "debug", sink: captureSink().sink });
  });

  afterAll(async () => {
    await teardownLogging();
  });

  it("sends an HTML message from the configured sender", async () => {
    const mailbox = jsonMailbox();
    const notifier = new EmailNotifier(mailbox.transport, { sender: "archive@example.org" });

    await notifier.send("requester@example.org", "Archive ready: Example page", "<p>done</p>");

    expect(mailbox.messages).toHaveLength(1);
    expect(mailbox.messages[0]).toMatchObject({
      from: { address: "archive@example.org" },
      to: [{ address: "requester@example.org" }],
      subject: "Archive ready: Example page",
      html: "<p>done</p>"
    });
  });

  it("gives up after the configured timeout", async () => {
    const stalled: MailTransport = { sendMail: () => new Promise(() => undefined) };
    const notifier = new EmailNotifier(stalled, { sender: "archive@example.org", timeoutMs: 20 });

    const err = await notifier.send("requester@example.org", "s", "b").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotificationTimeoutError);
    expect(err).toMatchObject({ timeoutMs: 20, message: "notification not delivered within 20ms" });
  });

  it("passes transport errors through", async () => {
    const failing: MailTransport = { sendMail: async () => Promise.reject(new Error("550 mailbox unavailable")) };
    const notifier = new EmailNotifier(failing, { sender: "archive@example.org" });

    await expect(notifier.send("requester@example.org", "s", "b")).rejects.toThrow("550 mailbox unavailable");
  });
});

describe("withTimeout", () => {
  it("returns the work's value when it settles first", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });
});

describe("renderArchiveReadyMessage", () => {
  it("links the archived page and names the record", () => {
    const message = renderArchiveReadyMessage(
      sampleRequest({ url: "https://example.org/a?b=1&c=<2>", title: "  News & views  " }),
      "rec_01HZX00000000000000000REC1",
      "https://archive.example.org/"
    );

    expect(message.subject).toBe("Archive ready: News & views");
    expect(message.body).toBe(
      [
        '<p>Your archive of <a href="https://example.org/a?b=1&amp;c=&lt;2&gt;">https://example.org/a?b=1&amp;c=&lt;2&gt;</a> is ready.</p>',
        "<p>Title: News &amp; views<br>Record: rec_01HZX00000000000000000REC1</p>",
        '<p><a href="https://archive.example.org/archives/rec_01HZX00000000000000000REC1">View the archived record</a></p>'
      ].join("\n")
    );
  });

  it("omits the record link without a public base URL", () => {
    expect(recordLink(null, "rec_01HZX00000000000000000REC1")).toBeNull();
    const message = renderArchiveReadyMessage(sampleRequest(), "rec_01HZX00000000000000000REC1");
    expect(message.body.split("\n")).toHaveLength(2);
  });
});
