import { BadRequestException } from "@nestjs/common";
import { ParseCursorPipe } from "./cursor.pipe";
import { cursorToString, emptyCursor } from "../dto/envelopes";

describe("ParseCursorPipe", () => {
	const pipe = new ParseCursorPipe();

	it("decodes the id written by cursorToString", () => {
		expect(cursorToString(42)).toBe("NDI=");
		expect(pipe.transform(cursorToString(42))).toEqual({ idBefore: 42 });
	});

	it("treats a missing cursor as the first page", () => {
		expect(pipe.transform(undefined)).toBe(emptyCursor);
		expect(pipe.transform("")).toBe(emptyCursor);
	});

	it("rejects anything but an id", () => {
		const stamped = Buffer.from("1732794465000:12345", "utf8").toString("base64");
		expect(() => pipe.transform(stamped)).toThrow(BadRequestException);
		expect(() => pipe.transform(cursorToString(1.5))).toThrow(BadRequestException);
	});
});
