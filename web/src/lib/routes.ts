export const DATASET_ROUTE = "/data/songs.json";
export const IDENTITY_ROUTE = "/data/songs/identity.json";
export const REFRESH_PARAM = "refresh";
