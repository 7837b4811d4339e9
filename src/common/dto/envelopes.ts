import {
	ApiProperty,
	ApiPropertyOptional,
	getSchemaPath,
} from "@nestjs/swagger";

export type ApiPaginatedMeta = {
	nextCursor?: string;
	total: number;
};

export type ApiEnvelope<T> = {
	data: T;
};

export type ApiPaginatedEnvelope<T> = ApiEnvelope<T> & {
	meta: ApiPaginatedMeta;
};

export type Cursor = {
	idBefore?: number;
};
export const emptyCursor: Cursor = {
	idBefore: undefined,
};

/**
 * Decodes a cursor produced by {@link cursorToString}; anything that is not an
 * id comes back as `undefined`.
 */
export function cursorFromString(cursor: string): Cursor {
	const raw = Buffer.from(cursor, "base64").toString("utf8");
	const id = Number(raw);
	return {
		idBefore: raw !== "" && Number.isSafeInteger(id) ? id : undefined,
	};
}

/** Opaque base64 of the last id seen */
export function cursorToString(id: number): string {
	return Buffer.from(String(id), "utf8").toString("base64");
}

export const envelope = <T>(data: T): ApiEnvelope<T> => ({ data });

export const paginatedEnvelope = <T>(
	data: T,
	meta: ApiPaginatedMeta,
): ApiPaginatedEnvelope<T> => ({
	data,
	meta,
});

export class ApiPaginatedMetaDto implements ApiPaginatedMeta {
	@ApiPropertyOptional({
		description:
			"Opaque cursor to fetch the next page. Omitted when there is no next page.",
		example: "MTIzNDU=",
	})
	nextCursor?: string;

	@ApiProperty({ example: 42 })
	total!: number;
}

/** Swagger-only shell; `data` is overridden per route. */
export class ApiEnvelopeShellDto<T> {
	@ApiProperty({ description: "Payload, shape varies by route" })
	data!: T;
}

export function getSchemaPathForDto(dto: Parameters<typeof getSchemaPath>[0]) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: { data: { $ref: getSchemaPath(dto) } },
				required: ["data"],
			},
		],
	};
}

export function getSchemaPathForPaginatedDto(
	dto: Parameters<typeof getSchemaPath>[0],
) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { type: "array", items: { $ref: getSchemaPath(dto) } },
					meta: { $ref: getSchemaPath(ApiPaginatedMetaDto) },
				},
				required: ["data", "meta"],
			},
		],
	};
}

/** Unpaginated list: `{ data: T[] }` */
export function getSchemaPathForListDto(
	dto: Parameters<typeof getSchemaPath>[0],
) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { type: "array", items: { $ref: getSchemaPath(dto) } },
				},
				required: ["data"],
			},
		],
	};
}
