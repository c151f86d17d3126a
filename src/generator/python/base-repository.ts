import { GENERATED_NOTICE } from "../shared.js";

const BASE_REPOSITORY = [
  `# ${GENERATED_NOTICE}`,
  "from __future__ import annotations",
  "",
  "from collections.abc import Callable",
  "from dataclasses import dataclass",
  "from decimal import Decimal",
  "from typing import Any, Generic, TypeVar",
  "",
  "import boto3",
  "from botocore.exceptions import ClientError",
  "from pydantic import BaseModel, ValidationError",
  "",
  "KeyType = str | int | Decimal | tuple[Any, ...]",
  "",
  "",
  "@dataclass(frozen=True)",
  "class EntityConfig:",
  '    """Key construction rules for one entity type."""',
  "",
  "    entity_type: str",
  "    pk_builder: Callable[[Any], KeyType]",
  "    pk_lookup_builder: Callable[..., KeyType]",
  "    sk_builder: Callable[[Any], KeyType] | None = None",
  "    sk_lookup_builder: Callable[..., KeyType] | None = None",
  "    prefix_builder: Callable[..., str] | None = None",
  "    index_attributes: Callable[[Any], dict[str, Any]] | None = None",
  "",
  "",
  "class ConfigurableEntity(BaseModel):",
  '    """Entity whose keys come from its EntityConfig."""',
  "",
  "    @classmethod",
  "    def get_config(cls) -> EntityConfig:",
  "        raise NotImplementedError",
  "",
  "    def pk(self) -> KeyType:",
  "        return self.get_config().pk_builder(self)",
  "",
  "    def sk(self) -> KeyType | None:",
  "        builder = self.get_config().sk_builder",
  "        return builder(self) if builder else None",
  "",
  "    def index_attributes(self) -> dict[str, Any]:",
  "        builder = self.get_config().index_attributes",
  "        return builder(self) if builder else {}",
  "",
  "    @classmethod",
  "    def build_pk_for_lookup(cls, *args: Any) -> KeyType:",
  "        return cls.get_config().pk_lookup_builder(*args)",
  "",
  "    @classmethod",
  "    def build_sk_for_lookup(cls, *args: Any) -> KeyType | None:",
  "        builder = cls.get_config().sk_lookup_builder",
  "        return builder(*args) if builder else None",
  "",
  "    @classmethod",
  "    def get_sk_prefix(cls, **kwargs: Any) -> str:",
  "        builder = cls.get_config().prefix_builder",
  '        return builder(**kwargs) if builder else ""',
  "",
  "",
  'T = TypeVar("T", bound=ConfigurableEntity)',
  "",
  "",
  "class BaseRepository(Generic[T]):",
  '    """CRUD operations and response parsing shared by the generated repositories."""',
  "",
  "    def __init__(",
  "        self,",
  "        model_class: type[T],",
  "        table_name: str,",
  "        pkey_name: str,",
  "        skey_name: str | None = None,",
  "    ):",
  "        self.model_class = model_class",
  "        self.table_name = table_name",
  "        self.pkey_name = pkey_name",
  "        self.skey_name = skey_name",
  '        self.dynamodb = boto3.resource("dynamodb")',
  "        self.table = self.dynamodb.Table(table_name)",
  "",
  "    def _key(self, pk: KeyType, sk: KeyType | None = None) -> dict[str, Any]:",
  "        key: dict[str, Any] = {self.pkey_name: pk}",
  "        if self.skey_name is not None:",
  "            key[self.skey_name] = sk",
  "        return key",
  "",
  "    def _to_item(self, entity: T) -> dict[str, Any]:",
  "        item = entity.model_dump(exclude_none=True)",
  "        item.update(entity.index_attributes())",
  "        item[self.pkey_name] = entity.pk()",
  "        if self.skey_name is not None:",
  "            item[self.skey_name] = entity.sk()",
  "        return item",
  "",
  "    def create(self, entity: T) -> T:",
  "        try:",
  "            self.table.put_item(",
  "                Item=self._to_item(entity),",
  '                ConditionExpression="attribute_not_exists(#pk)",',
  '                ExpressionAttributeNames={"#pk": self.pkey_name},',
  "            )",
  "        except ClientError as error:",
  '            if error.response["Error"]["Code"] == "ConditionalCheckFailedException":',
  '                raise ValueError(f"{self.model_class.__name__} already exists") from error',
  "            raise",
  "        return entity",
  "",
  "    def put(self, entity: T) -> T:",
  "        self.table.put_item(Item=self._to_item(entity))",
  "        return entity",
  "",
  "    def get(self, pk: KeyType, sk: KeyType | None = None, consistent_read: bool = False) -> T | None:",
  "        response = self.table.get_item(Key=self._key(pk, sk), ConsistentRead=consistent_read)",
  '        item = response.get("Item")',
  "        return self.model_class(**item) if item else None",
  "",
  "    def update(self, entity: T) -> T:",
  "        try:",
  "            self.table.put_item(",
  "                Item=self._to_item(entity),",
  '                ConditionExpression="attribute_exists(#pk)",',
  '                ExpressionAttributeNames={"#pk": self.pkey_name},',
  "            )",
  "        except ClientError as error:",
  '            if error.response["Error"]["Code"] == "ConditionalCheckFailedException":',
  '                raise ValueError(f"{self.model_class.__name__} not found") from error',
  "            raise",
  "        return entity",
  "",
  "    def delete(self, pk: KeyType, sk: KeyType | None = None) -> bool:",
  '        response = self.table.delete_item(Key=self._key(pk, sk), ReturnValues="ALL_OLD")',
  '        return "Attributes" in response',
  "",
  "    def batch_get(self, keys: list[dict[str, Any]]) -> list[T]:",
  "        items: list[dict[str, Any]] = []",
  "        for start in range(0, len(keys), 100):",
  '            request: dict[str, Any] | None = {self.table_name: {"Keys": keys[start : start + 100]}}',
  "            while request:",
  "                response = self.dynamodb.batch_get_item(RequestItems=request)",
  '                items.extend(response["Responses"].get(self.table_name, []))',
  '                request = response.get("UnprocessedKeys") or None',
  "        return [self.model_class(**item) for item in items]",
  "",
  "    def batch_write(self, entities: list[T]) -> bool:",
  "        with self.table.batch_writer() as batch:",
  "            for entity in entities:",
  "                batch.put_item(Item=self._to_item(entity))",
  "        return True",
  "",
  "    @staticmethod",
  "    def _page_args(limit: int, exclusive_start_key: dict[str, Any] | None) -> dict[str, Any]:",
  '        args: dict[str, Any] = {"Limit": limit}',
  "        if exclusive_start_key is not None:",
  '            args["ExclusiveStartKey"] = exclusive_start_key',
  "        return args",
  "",
  "    def _parse_query_response(",
  "        self, response: dict[str, Any], skip_invalid_items: bool = True",
  "    ) -> tuple[list[T], dict[str, Any] | None]:",
  "        items: list[T] = []",
  '        for item in response.get("Items", []):',
  "            try:",
  "                items.append(self.model_class(**item))",
  "            except ValidationError:",
  "                if not skip_invalid_items:",
  "                    raise",
  '        return items, response.get("LastEvaluatedKey")',
];

/** `base_repository.py`: entity configuration and the generic repository. */
export const renderPythonBaseRepository = (): string => `${BASE_REPOSITORY.join("\n")}\n`;
