import { describe, it, expect } from "vitest";

import { accessEntriesToPolicy, policyToAccessEntries } from "./bigquery.js";
import { addMemberToPolicy } from "./index.js";

const access = [
  { role: "OWNER", specialGroup: "projectOwners" },
  { role: "READER", userByEmail: "bob@example.com" },
  { role: "roles/bigquery.dataViewer", groupByEmail: "analysts@example.com" },
  { role: "READER", userByEmail: "bob@example.com" },
  { view: { projectId: "proj1", datasetId: "reports", tableId: "summary" } },
  { role: "WRITER", iamMember: "principal://iam.googleapis.com/locations/global/workforcePools/p/subject/s" },
];

describe("accessEntriesToPolicy", () => {
  it("groups grants by role, mapping legacy role names", () => {
    const policy = accessEntriesToPolicy(access, "etag-7");

    expect(policy).toEqual({
      version: 1,
      etag: "etag-7",
      bindings: [
        { role: "roles/bigquery.dataOwner", members: ["specialGroup:projectOwners"] },
        {
          role: "roles/bigquery.dataViewer",
          members: ["user:bob@example.com", "group:analysts@example.com"],
        },
        {
          role: "roles/bigquery.dataEditor",
          members: ["principal://iam.googleapis.com/locations/global/workforcePools/p/subject/s"],
        },
      ],
      passthrough: [{ view: { projectId: "proj1", datasetId: "reports", tableId: "summary" } }],
    });
  });

  it("omits passthrough when every entry is a grant", () => {
    expect(accessEntriesToPolicy([{ role: "READER", domain: "example.com" }], "e")).toEqual({
      version: 1,
      etag: "e",
      bindings: [{ role: "roles/bigquery.dataViewer", members: ["domain:example.com"] }],
    });
  });
});

describe("policyToAccessEntries", () => {
  it("writes one entry per member and keeps passthrough entries last", () => {
    const policy = accessEntriesToPolicy(access, "etag-7");
    const { policy: updated } = addMemberToPolicy(
      policy,
      "roles/bigquery.dataViewer",
      "serviceAccount:etl@proj1.iam.gserviceaccount.com",
    );

    expect(policyToAccessEntries(updated)).toEqual([
      { role: "roles/bigquery.dataOwner", specialGroup: "projectOwners" },
      { role: "roles/bigquery.dataViewer", userByEmail: "bob@example.com" },
      { role: "roles/bigquery.dataViewer", groupByEmail: "analysts@example.com" },
      { role: "roles/bigquery.dataViewer", userByEmail: "etl@proj1.iam.gserviceaccount.com" },
      {
        role: "roles/bigquery.dataEditor",
        iamMember: "principal://iam.googleapis.com/locations/global/workforcePools/p/subject/s",
      },
      { view: { projectId: "proj1", datasetId: "reports", tableId: "summary" } },
    ]);
  });

  it("maps domain members back to the domain field", () => {
    expect(
      policyToAccessEntries({ version: 1, etag: "", bindings: [{ role: "roles/viewer", members: ["domain:example.com"] }] }),
    ).toEqual([{ role: "roles/viewer", domain: "example.com" }]);
  });
});
