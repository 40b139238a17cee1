export type ChangeType = "created" | "modified" | "deleted" | "renamed";

export type EventBatchEntry = {
    path: string;
    changeType: ChangeType;
};
