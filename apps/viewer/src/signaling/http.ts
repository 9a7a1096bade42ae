import { ProblemSchema } from "@peerstream/protocol";
import { NegotiationError, describeError } from "@peerstream/session";

// The server refused the offer; status is the HTTP status it answered with.
export class OfferRejectedError extends NegotiationError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "OfferRejectedError";
    this.status = status;
  }
}

function describeRejection(body: string): string {
  try {
    const parsed = ProblemSchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      return `${parsed.data.title}: ${parsed.data.detail}`;
    }
  } catch {
    // Not a problem document; fall through to the raw body.
  }
  return body.trim() || "no details";
}

// POST the offer SDP as text and return the answer SDP.
export async function postOffer(url: string, sdp: string, signal?: AbortSignal): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/sdp" },
      body: sdp,
      signal,
    });
  } catch (error) {
    throw new NegotiationError(`Could not reach ${url}: ${describeError(error)}`, { cause: error });
  }

  const body = await response.text();
  if (!response.ok) {
    throw new OfferRejectedError(
      response.status,
      `Offer rejected with status ${response.status} (${describeRejection(body)})`,
    );
  }
  if (body.trim().length === 0) {
    throw new NegotiationError("Server returned an empty answer");
  }
  return body;
}
