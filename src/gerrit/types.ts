import { z } from "zod";

// Shapes of the JSON Gerrit prints for `stream-events` and `query --format=JSON`.
// Unknown keys are stripped; missing required keys fail the parse.

export const UserSchema = z.object({
  name: z.string().optional(),
  username: z.string(),
  email: z.string().optional(),
});

export type User = z.infer<typeof UserSchema>;

export const ApprovalSchema = z.object({
  type: z.string(),
  description: z.string(),
  value: z.string(),
  oldValue: z.string().optional(),
});

export type Approval = z.infer<typeof ApprovalSchema>;

export const InlineCommentSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  reviewer: UserSchema,
  message: z.string(),
});

export type InlineComment = z.infer<typeof InlineCommentSchema>;

export const PatchSetSchema = z.object({
  number: z.number().int(),
  revision: z.string(),
  parents: z.array(z.string()),
  ref: z.string(),
  uploader: UserSchema,
  createdOn: z.number().int(),
  author: UserSchema,
  isDraft: z.boolean().default(false),
  kind: z.string(),
  sizeInsertions: z.number().int(),
  sizeDeletions: z.number().int(),
  comments: z.array(InlineCommentSchema).optional(),
});

export type PatchSet = z.infer<typeof PatchSetSchema>;

export const ChangeStatusSchema = z.enum(["NEW", "DRAFT", "MERGED", "ABANDONED"]);

export type ChangeStatus = z.infer<typeof ChangeStatusSchema>;

export const SubmitRecordSchema = z.object({
  status: z.enum(["OK", "NOT_READY", "CLOSED", "FORCED", "RULE_ERROR"]),
  labels: z
    .array(
      z.object({
        label: z.string(),
        status: z.string(),
        by: UserSchema.optional(),
      }),
    )
    .optional(),
});

export type SubmitRecord = z.infer<typeof SubmitRecordSchema>;

export const CommentSchema = z.object({
  timestamp: z.number().int(),
  reviewer: UserSchema,
  message: z.string(),
});

export type Comment = z.infer<typeof CommentSchema>;

export const ChangeSchema = z.object({
  project: z.string(),
  branch: z.string(),
  id: z.string(),
  number: z.number().int(),
  subject: z.string(),
  topic: z.string().optional(),
  owner: UserSchema,
  url: z.string(),
  commitMessage: z.string(),
  status: ChangeStatusSchema,
  currentPatchSet: PatchSetSchema.optional(),
  patchSets: z.array(PatchSetSchema).optional(),
  comments: z.array(CommentSchema).optional(),
  submitRecords: z.array(SubmitRecordSchema).optional(),
});

export type Change = z.infer<typeof ChangeSchema>;

export const ChangeKeySchema = z.object({
  id: z.string(),
});

export type ChangeKey = z.infer<typeof ChangeKeySchema>;

/** Only these two event classes are subscribed to; anything else fails to parse. */
export const EventTypeSchema = z.enum(["comment-added", "reviewer-added"]);

export type EventType = z.infer<typeof EventTypeSchema>;

export const EventSchema = z.object({
  author: UserSchema.optional(),
  uploader: UserSchema.optional(),
  approvals: z.array(ApprovalSchema).optional(),
  reviewer: UserSchema.optional(),
  comment: z.string().optional(),
  patchSet: PatchSetSchema,
  change: ChangeSchema,
  project: z.string(),
  refName: z.string(),
  changeKey: ChangeKeySchema,
  type: EventTypeSchema,
  eventCreatedOn: z.number().int(),
});

export type Event = z.infer<typeof EventSchema>;

export type ExtendedInfo = "submit-records" | "inline-comments";

export type StreamErrorKind = "io" | "parse" | "terminated";

export class StreamError extends Error {
  readonly kind: StreamErrorKind;

  constructor(kind: StreamErrorKind, message: string) {
    super(message);
    this.name = "StreamError";
    this.kind = kind;
  }
}
