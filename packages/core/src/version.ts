import corePkg from "../package.json";

export const VERSION: string = corePkg.version;

/** Name reported to clients and tool servers. */
export const PRODUCT_NAME = "tidechat";
