export const COMMIT_FIELD_SEPARATOR = "\u001f";

export const COMMIT_LIST_FORMAT = `%H${COMMIT_FIELD_SEPARATOR}%s`;

export const AUTHOR_NAME_FORMAT = "%an";
