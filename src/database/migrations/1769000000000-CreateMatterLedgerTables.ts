import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableColumnOptions,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

const uuidColumn = (name: string): TableColumnOptions => ({
  name,
  type: 'varchar',
  length: '36',
  isNullable: false,
});

const activityColumns = (
  entityColumn: string,
  extra: TableColumnOptions[] = [],
): TableColumnOptions[] => [
  {
    name: 'id',
    type: 'integer',
    isPrimary: true,
    isGenerated: true,
    generationStrategy: 'increment',
  },
  uuidColumn(entityColumn),
  ...extra,
  {
    name: 'activity',
    type: 'varchar',
    length: '20',
    isNullable: false,
  },
  uuidColumn('user_id'),
  {
    name: 'created_at',
    type: 'timestamp',
    isNullable: false,
  },
];

export class CreateMatterLedgerTables1769000000000
  implements MigrationInterface
{
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'matters',
        columns: [
          { ...uuidColumn('id'), isPrimary: true },
          {
            name: 'description',
            type: 'varchar',
            length: '128',
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamp',
            isNullable: false,
          },
          {
            name: 'is_archived',
            type: 'boolean',
            default: false,
            isNullable: false,
          },
          {
            name: 'is_deleted',
            type: 'boolean',
            default: false,
            isNullable: false,
          },
          {
            name: 'version',
            type: 'integer',
            default: 1,
            isNullable: false,
          },
        ],
      }),
      true,
    );

    const isPostgres = queryRunner.connection.options.type === 'postgres';

    // Descriptions are unique among live matters only
    if (isPostgres) {
      await queryRunner.query(`
        CREATE UNIQUE INDEX "IDX_matters_description_live"
        ON matters (LOWER(description))
        WHERE is_deleted = false;
      `);
    }

    await queryRunner.createIndex(
      'matters',
      new TableIndex({
        name: 'IDX_matters_created_at',
        columnNames: ['created_at'],
      }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'documents',
        columns: [
          { ...uuidColumn('id'), isPrimary: true },
          uuidColumn('matter_id'),
          {
            name: 'file_name',
            type: 'varchar',
            length: '128',
            isNullable: false,
          },
          {
            name: 'extension',
            type: 'varchar',
            length: '5',
            isNullable: false,
          },
          {
            name: 'file_size',
            type: 'integer',
            isNullable: false,
          },
          {
            name: 'mime_type',
            type: 'varchar',
            length: '128',
            isNullable: false,
          },
          {
            name: 'checksum',
            type: 'varchar',
            length: '64',
            isNullable: false,
          },
          {
            name: 'is_checked_out',
            type: 'boolean',
            default: false,
            isNullable: false,
          },
          {
            name: 'checked_out_by',
            type: 'varchar',
            length: '36',
            isNullable: true,
          },
          {
            name: 'is_deleted',
            type: 'boolean',
            default: false,
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamp',
            isNullable: false,
          },
          {
            name: 'version',
            type: 'integer',
            default: 1,
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createForeignKey(
      'documents',
      new TableForeignKey({
        columnNames: ['matter_id'],
        referencedTableName: 'matters',
        referencedColumnNames: ['id'],
      }),
    );

    if (isPostgres) {
      await queryRunner.query(`
        ALTER TABLE documents
        ADD CONSTRAINT check_documents_checkout_holder
        CHECK (is_checked_out = (checked_out_by IS NOT NULL));
      `);
    }

    await queryRunner.createIndex(
      'documents',
      new TableIndex({
        name: 'IDX_documents_matter_file_name',
        columnNames: ['matter_id', 'file_name'],
      }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'revisions',
        columns: [
          { ...uuidColumn('id'), isPrimary: true },
          uuidColumn('document_id'),
          {
            name: 'revision_number',
            type: 'integer',
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamp',
            isNullable: false,
          },
          {
            name: 'is_deleted',
            type: 'boolean',
            default: false,
            isNullable: false,
          },
          {
            name: 'version',
            type: 'integer',
            default: 1,
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createForeignKey(
      'revisions',
      new TableForeignKey({
        columnNames: ['document_id'],
        referencedTableName: 'documents',
        referencedColumnNames: ['id'],
      }),
    );

    await queryRunner.createIndex(
      'revisions',
      new TableIndex({
        name: 'IDX_revisions_document_number',
        columnNames: ['document_id', 'revision_number'],
        isUnique: true,
      }),
    );

    // Activity ledgers: insert-only, no foreign keys so history outlives
    // any future cleanup of the audited rows
    await this.createActivityTable(
      queryRunner,
      'matter_activities',
      'matter_id',
    );
    await this.createActivityTable(
      queryRunner,
      'document_activities',
      'document_id',
    );
    await this.createActivityTable(
      queryRunner,
      'revision_activities',
      'revision_id',
    );

    await queryRunner.createTable(
      new Table({
        name: 'matter_document_activities',
        columns: activityColumns('matter_id', [
          uuidColumn('counterpart_matter_id'),
          uuidColumn('document_id'),
          {
            name: 'direction',
            type: 'varchar',
            length: '4',
            isNullable: false,
          },
        ]),
      }),
      true,
    );

    if (isPostgres) {
      await queryRunner.query(`
        ALTER TABLE matter_document_activities
        ADD CONSTRAINT check_matter_document_activities_direction
        CHECK (direction IN ('FROM', 'TO'));
      `);
    }

    await queryRunner.createIndex(
      'matter_document_activities',
      new TableIndex({
        name: 'IDX_matter_document_activities_matter_direction',
        columnNames: ['matter_id', 'direction'],
      }),
    );

    await queryRunner.createIndex(
      'matter_document_activities',
      new TableIndex({
        name: 'IDX_matter_document_activities_document_id',
        columnNames: ['document_id'],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('matter_document_activities', true);
    await queryRunner.dropTable('revision_activities', true);
    await queryRunner.dropTable('document_activities', true);
    await queryRunner.dropTable('matter_activities', true);
    await queryRunner.dropTable('revisions', true);
    await queryRunner.dropTable('documents', true);
    await queryRunner.dropTable('matters', true);
  }

  private async createActivityTable(
    queryRunner: QueryRunner,
    tableName: string,
    entityColumn: string,
  ): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: tableName,
        columns: activityColumns(entityColumn),
      }),
      true,
    );

    await queryRunner.createIndex(
      tableName,
      new TableIndex({
        name: `IDX_${tableName}_${entityColumn}`,
        columnNames: [entityColumn],
      }),
    );

    await queryRunner.createIndex(
      tableName,
      new TableIndex({
        name: `IDX_${tableName}_created_at`,
        columnNames: ['created_at'],
      }),
    );
  }
}
