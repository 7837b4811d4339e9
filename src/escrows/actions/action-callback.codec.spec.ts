import {
	decodeActionCallback,
	encodeActionCallback,
} from "./action-callback.codec";
import { MalformedCallbackError } from "../../common/errors";

describe("action callback codec", () => {
	it("joins action, code and token with pipes", () => {
		expect(
			encodeActionCallback({
				action: "agree_buyer",
				escrowCode: "PW-100000",
				token: "tok_abc",
			}),
		).toBe("agree_buyer|PW-100000|tok_abc");
	});

	it("decodes a well-formed payload", () => {
		expect(decodeActionCallback("disagree|PW-100001|xyz")).toEqual({
			action: "disagree",
			escrowCode: "PW-100001",
			token: "xyz",
		});
	});

	it.each([
		["too few parts", "agree_buyer|PW-100000"],
		["too many parts", "a|b|c|d"],
		["an empty part", "agree_buyer||tok"],
		["an empty string", ""],
	])("rejects %s", (_name, data) => {
		expect(() => decodeActionCallback(data)).toThrow(MalformedCallbackError);
	});

	it("refuses to encode a part containing the separator", () => {
		expect(() =>
			encodeActionCallback({ action: "a|b", escrowCode: "PW-1", token: "t" }),
		).toThrow(MalformedCallbackError);
	});
});
