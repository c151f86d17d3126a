import { describe, it, expect } from "vitest";
import { DEFAULT_GENERATION_OPTIONS } from "../../config/options.js";
import { renderPythonEntities } from "../../generator/python/entities.js";
import { renderPythonRepositories } from "../../generator/python/repositories.js";
import { renderPythonTransactionService } from "../../generator/python/transaction-service.js";
import { renderPythonUsageExamples } from "../../generator/python/usage-examples.js";
import { pythonProfile } from "../../languages/python.js";
import { createUsageLookup } from "../../languages/sample-values.js";
import { loadUsageData } from "../../loader/load-usage-data.js";
import { resolveSchema, usageDocument, usersSchema } from "../fixtures.js";
import { trimmedLines } from "./helpers.js";

const model = resolveSchema(usersSchema());

describe("renderPythonEntities()", () => {
  const lines = trimmedLines(renderPythonEntities(model.entities, pythonProfile));

  it("builds the key configuration from the templates", () => {
    expect(lines).toContain("USER_CONFIG = EntityConfig(");
    expect(lines).toContain('entity_type="USER",');
    expect(lines).toContain("pk_builder=lambda entity: f'USER#{entity.user_id}',");
    expect(lines).toContain("pk_lookup_builder=lambda user_id: f'USER#{user_id}',");
    expect(lines).toContain("sk_builder=lambda entity: 'PROFILE',");
    expect(lines).toContain("sk_lookup_builder=lambda: 'PROFILE',");
    expect(lines).toContain('prefix_builder=lambda **kwargs: "PROFILE",');
  });

  it("writes index key attributes, passing numeric fields through", () => {
    expect(lines).toContain(
      "index_attributes=lambda entity: {\"gsi1pk\": f'STATUS#{entity.status}', \"gsi1sk\": entity.created_at},",
    );
  });

  it("declares typed model fields", () => {
    expect(lines).toContain("class User(ConfigurableEntity):");
    expect(lines).toContain("user_id: str");
    expect(lines).toContain("created_at: int");
    expect(lines).toContain("nickname: str | None = None");
    expect(lines).toContain("total: Decimal");
  });

  it("adds index lookup builders", () => {
    expect(lines).toContain("def build_gsi_pk_for_lookup_status_index(cls, status: str) -> KeyType:");
    expect(lines).toContain("return f'STATUS#{status}'");
  });
});

describe("renderPythonRepositories()", () => {
  const lines = trimmedLines(
    renderPythonRepositories(model.entities, pythonProfile, DEFAULT_GENERATION_OPTIONS),
  );

  it("imports every entity", () => {
    expect(lines).toContain("from entities import User, Order");
  });

  it("serves the folded get pattern with a consistent CRUD get", () => {
    expect(lines).toContain("def get_user(self, user_id: str) -> User | None:");
    expect(lines).toContain("Serves access pattern #1.");
    expect(lines).toContain("pk = User.build_pk_for_lookup(user_id)");
    expect(lines).toContain("sk = User.build_sk_for_lookup()");
    expect(lines).toContain("return self.get(pk, sk, consistent_read=True)");
  });

  it("renders the renamed put pattern", () => {
    expect(lines).toContain("def put_user(self, user: User) -> User | None:");
    expect(lines).toContain("return self.put(user)");
    expect(lines).toContain("Named put_user because create_user is a generated CRUD method.");
  });

  it("renders a paginated index query", () => {
    expect(lines).toContain("def list_users_by_status(");
    expect(lines).toContain(") -> tuple[list[User], dict[str, Any] | None]:");
    expect(lines).toContain('"IndexName": "StatusIndex",');
    expect(lines).toContain('"KeyConditionExpression": "#pk = :pk",');
    expect(lines).toContain('"ExpressionAttributeNames": {"#pk": "gsi1pk"},');
    expect(lines).toContain("\"ExpressionAttributeValues\": {\":pk\": f'STATUS#{status}'},");
    expect(lines).toContain("args.update(self._page_args(limit, exclusive_start_key))");
  });

  it("renders a conditional update of named attributes", () => {
    expect(lines).toContain("Key={\"pk\": f'USER#{user_id}', \"sk\": 'PROFILE'},");
    expect(lines).toContain('UpdateExpression="SET #u0 = :u0",');
    expect(lines).toContain('ConditionExpression="attribute_exists(#pk)",');
    expect(lines).toContain('ExpressionAttributeNames={"#u0": "status", "#pk": "pk"},');
    expect(lines).toContain('ExpressionAttributeValues={":u0": status},');
  });

  it("limits an item collection query to the entity's sort prefix", () => {
    expect(lines).toContain(
      "\"ExpressionAttributeValues\": {\":pk\": f'USER#{user_id}', \":sk\": 'ORDER#'},",
    );
    expect(lines).toContain("Shares partitions with: Order");
  });
});

describe("renderPythonTransactionService()", () => {
  const lines = trimmedLines(
    renderPythonTransactionService(model, pythonProfile, DEFAULT_GENERATION_OPTIONS),
  );

  it("writes one method per transaction", () => {
    expect(lines).toContain(
      "def place_order(self, order: Order, user_id: str, status: str) -> bool:",
    );
    expect(lines).toContain("Transaction #20: TransactWrite across Users");
  });

  it("serializes items and update values", () => {
    expect(lines).toContain('"Item": self._serialize(self._to_item(order, "pk", "sk")),');
    expect(lines).toContain('"ExpressionAttributeValues": self._serialize({":u0": status}),');
  });
});

describe("renderPythonUsageExamples()", () => {
  it("fills samples from usage data", () => {
    const usage = createUsageLookup(loadUsageData(usageDocument()).usageData);
    const lines = trimmedLines(renderPythonUsageExamples(model, pythonProfile, usage));
    expect(lines).toContain("sample_user = User(");
    expect(lines).toContain('email="ada@example.com",');
    expect(lines).toContain("created_at=1700000000,");
    expect(lines).toContain('nickname="sample_nickname",');
    expect(lines).toContain('total=Decimal("12.5"),');
  });

  it("falls back to generated samples without usage data", () => {
    const lines = trimmedLines(
      renderPythonUsageExamples(model, pythonProfile, createUsageLookup(undefined)),
    );
    expect(lines).toContain('user_id="user_id123",');
    expect(lines).toContain('status="active",');
  });
});
